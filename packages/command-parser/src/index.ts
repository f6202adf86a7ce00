export { CommandParser, stripCodeFences } from "./commandParser";
export type {
	CommandIntent,
	CommandParserOptions,
	ParsedCommand,
} from "./commandParser";
export { CommandParseError } from "./errors";
export { OllamaCompletionClient } from "./ollamaClient";
export type { CompletionClient, OllamaClientOptions } from "./ollamaClient";
export { EXAMPLE_COMMANDS, buildParsePrompt } from "./prompts";
