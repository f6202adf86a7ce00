import http from "node:http";
import { createLogger } from "@slicebot/core";
import type { Router } from "./routes";

const logger = createLogger("trader-server");

const MAX_BODY_BYTES = 64 * 1024;

const readBody = (req: http.IncomingMessage): Promise<string> =>
	new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		let size = 0;
		req.on("data", (chunk: Buffer) => {
			size += chunk.length;
			if (size > MAX_BODY_BYTES) {
				reject(new Error("Request body too large"));
				req.destroy();
				return;
			}
			chunks.push(chunk);
		});
		req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
		req.on("error", reject);
	});

const send = (res: http.ServerResponse, status: number, body: unknown): void => {
	if (status === 204 || body === null) {
		res.writeHead(status);
		res.end();
		return;
	}
	res.writeHead(status, { "Content-Type": "application/json" });
	res.end(JSON.stringify(body));
};

export const createHttpServer = (router: Router): http.Server =>
	http.createServer((req, res) => {
		const startedAt = Date.now();
		const method = req.method ?? "GET";
		const url = req.url ?? "/";
		readBody(req)
			.then((body) => router({ method, url, body }))
			.then((response) => {
				send(res, response.status, response.body);
				logger.info("http_request", {
					method,
					url,
					status: response.status,
					durationMs: Date.now() - startedAt,
				});
			})
			.catch((error: unknown) => {
				logger.warn("http_request_failed", {
					method,
					url,
					error: error instanceof Error ? error.message : String(error),
				});
				if (!res.headersSent) {
					send(res, 400, { error: "BAD_REQUEST", message: "Could not read request" });
				}
			});
	});
