import {
	ExchangeError,
	InvalidSpecError,
	NotFoundError,
	OrderValidationError,
	RunActiveError,
	SlicebotError,
	createLogger,
	type AccountClient,
	type ExecutionClient,
	type ExecutionMode,
} from "@slicebot/core";
import { CommandParseError, type CommandParser } from "@slicebot/command-parser";
import type { SentimentWorker } from "@slicebot/sentiment";
import {
	isTerminalStatus,
	validateOrderRequest,
	type StrategyEngine,
} from "@slicebot/strategy-engine";

const logger = createLogger("trader-server:routes");

export interface ApiRequest {
	method: string;
	url: string;
	body: string;
}

export interface ApiResponse {
	status: number;
	body: unknown;
}

export interface RouteDeps {
	mode: ExecutionMode;
	engine: Pick<
		StrategyEngine,
		"submit" | "cancel" | "getStatus" | "listRuns" | "purge"
	>;
	execution: ExecutionClient;
	account: AccountClient;
	commandParser: Pick<CommandParser, "parse">;
	sentiment: Pick<SentimentWorker, "track" | "getReading" | "getBreakdown">;
}

export type Router = (request: ApiRequest) => Promise<ApiResponse>;

class BadRequestError extends SlicebotError {
	constructor(message: string) {
		super("BAD_REQUEST", message);
	}
}

class RouteNotFoundError extends SlicebotError {
	constructor(method: string, path: string) {
		super("ROUTE_NOT_FOUND", `No route for ${method} ${path}`);
	}
}

const parseBody = (raw: string): unknown => {
	if (!raw.trim()) {
		return {};
	}
	try {
		return JSON.parse(raw);
	} catch {
		throw new BadRequestError("Request body is not valid JSON");
	}
};

const readCommand = (body: unknown): { text: string; execute: boolean } => {
	if (typeof body !== "object" || body === null) {
		throw new BadRequestError("Expected a JSON object");
	}
	const text: unknown = Reflect.get(body, "text");
	if (typeof text !== "string" || !text.trim()) {
		throw new BadRequestError("text is required");
	}
	return { text, execute: Reflect.get(body, "execute") === true };
};

export const toErrorResponse = (error: unknown): ApiResponse => {
	if (error instanceof InvalidSpecError || error instanceof OrderValidationError) {
		return {
			status: 400,
			body: { error: error.code, message: error.message, issues: error.issues },
		};
	}
	if (error instanceof BadRequestError) {
		return { status: 400, body: { error: error.code, message: error.message } };
	}
	if (error instanceof NotFoundError || error instanceof RouteNotFoundError) {
		return { status: 404, body: { error: error.code, message: error.message } };
	}
	if (error instanceof RunActiveError) {
		return { status: 409, body: { error: error.code, message: error.message } };
	}
	if (error instanceof CommandParseError) {
		return { status: 422, body: { error: error.code, message: error.message } };
	}
	if (error instanceof ExchangeError) {
		return {
			status: 502,
			body: { error: error.code, message: error.message, retryable: error.retryable },
		};
	}
	logger.error("request_failed", {
		error: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	return { status: 500, body: { error: "INTERNAL", message: "Internal server error" } };
};

export const createRouter = (deps: RouteDeps): Router => {
	const { engine } = deps;

	const route = async (
		method: string,
		segments: string[],
		body: string
	): Promise<ApiResponse | null> => {
		const [resource, id, action] = segments;

		if (resource === "health" && segments.length === 1 && method === "GET") {
			const active = engine
				.listRuns()
				.filter((run) => !isTerminalStatus(run.status)).length;
			return { status: 200, body: { status: "ok", mode: deps.mode, activeRuns: active } };
		}

		if (resource === "account" && segments.length === 1 && method === "GET") {
			const account = await deps.account.getAccount();
			return { status: 200, body: { mode: deps.mode, ...account } };
		}

		if (resource === "orders" && segments.length === 1 && method === "POST") {
			const request = validateOrderRequest(parseBody(body));
			const order = await deps.execution.placeOrder(request);
			return { status: 201, body: order };
		}

		if (resource === "strategies") {
			if (segments.length === 1 && method === "POST") {
				const runId = engine.submit(parseBody(body));
				return { status: 202, body: { runId } };
			}
			if (segments.length === 1 && method === "GET") {
				return { status: 200, body: { runs: engine.listRuns() } };
			}
			if (segments.length === 2 && method === "GET") {
				return { status: 200, body: engine.getStatus(id) };
			}
			if (segments.length === 2 && method === "DELETE") {
				engine.purge(id);
				return { status: 204, body: null };
			}
			if (segments.length === 3 && action === "cancel" && method === "POST") {
				engine.cancel(id);
				return { status: 202, body: { runId: id, cancelRequested: true } };
			}
		}

		if (resource === "commands" && segments.length === 1 && method === "POST") {
			const { text, execute } = readCommand(parseBody(body));
			const parsed = await deps.commandParser.parse(text);
			if (!execute) {
				return { status: 200, body: { parsed } };
			}
			if (parsed.intent === "market") {
				const order = await deps.execution.placeOrder(parsed.order);
				return { status: 201, body: { parsed, order } };
			}
			return { status: 202, body: { parsed, runId: engine.submit(parsed.spec) } };
		}

		if (resource === "sentiment" && segments.length === 2 && method === "GET") {
			const symbol = id.toUpperCase();
			await deps.sentiment.track(symbol);
			return {
				status: 200,
				body: {
					symbol,
					...deps.sentiment.getReading(symbol),
					sources: deps.sentiment.getBreakdown(symbol),
				},
			};
		}

		return null;
	};

	return async (request) => {
		const path = new URL(request.url, "http://localhost").pathname;
		const segments = path
			.split("/")
			.filter((segment) => segment.length > 0)
			.map((segment) => decodeURIComponent(segment));
		const method = request.method.toUpperCase();
		try {
			const response = await route(method, segments, request.body);
			if (!response) {
				throw new RouteNotFoundError(method, path);
			}
			return response;
		} catch (error) {
			return toErrorResponse(error);
		}
	};
};
