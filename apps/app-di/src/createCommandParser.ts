import type { SlicebotConfig } from "@slicebot/core";
import {
	CommandParser,
	OllamaCompletionClient,
	type CompletionClient,
} from "@slicebot/command-parser";

export const createCommandParser = (
	config: Pick<SlicebotConfig, "env" | "engine">,
	client?: CompletionClient
): CommandParser =>
	new CommandParser({
		client:
			client ??
			new OllamaCompletionClient({
				host: config.env.ollamaHost,
				model: config.env.ollamaModel,
			}),
		defaults: { quantityPrecision: config.engine.quantityPrecision },
	});
