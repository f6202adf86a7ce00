import { z } from "zod";
import { createLogger } from "@slicebot/core";
import { CommandParseError } from "./errors";

const ollamaLogger = createLogger("command-parser:ollama");

/** Anything that can turn a prompt into raw completion text. */
export interface CompletionClient {
	complete(prompt: string): Promise<string>;
}

export interface OllamaClientOptions {
	host: string;
	model: string;
	/** Low by default so the same command parses the same way. */
	temperature?: number;
	maxTokens?: number;
	timeoutMs?: number;
	fetchFn?: typeof fetch;
}

const generateResponseSchema = z.object({
	response: z.string(),
});

export class OllamaCompletionClient implements CompletionClient {
	private readonly fetchFn: typeof fetch;

	constructor(private readonly options: OllamaClientOptions) {
		this.fetchFn = options.fetchFn ?? fetch;
	}

	async complete(prompt: string): Promise<string> {
		const { host, model } = this.options;
		const url = `${host.replace(/\/+$/, "")}/api/generate`;
		const startedAt = Date.now();

		let response: Response;
		try {
			response = await this.fetchFn(url, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify({
					model,
					prompt,
					stream: false,
					options: {
						temperature: this.options.temperature ?? 0.1,
						num_predict: this.options.maxTokens ?? 500,
					},
				}),
				signal: AbortSignal.timeout(this.options.timeoutMs ?? 60_000),
			});
		} catch (error) {
			throw new CommandParseError(
				`LLM request failed: ${error instanceof Error ? error.message : String(error)}`
			);
		}

		if (!response.ok) {
			throw new CommandParseError(
				`LLM request failed with HTTP ${response.status}`
			);
		}

		const body: unknown = await response.json();
		const parsed = generateResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new CommandParseError("LLM response is missing the completion text");
		}

		ollamaLogger.debug("completion_received", {
			model,
			durationMs: Date.now() - startedAt,
			chars: parsed.data.response.length,
		});
		return parsed.data.response;
	}
}
