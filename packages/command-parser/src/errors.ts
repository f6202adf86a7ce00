import { SlicebotError } from "@slicebot/core";

export class CommandParseError extends SlicebotError {
	constructor(message: string) {
		super("COMMAND_PARSE", message);
	}
}
