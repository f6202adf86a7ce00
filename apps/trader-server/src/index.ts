import { createServices } from "@slicebot/app-di";
import { createLogger, loadSlicebotConfig } from "@slicebot/core";
import { createRouter } from "./routes";
import { createHttpServer } from "./server";

const logger = createLogger("trader-server");

const main = async (): Promise<void> => {
	logger.info("server_start", {
		env: process.env.NODE_ENV ?? "development",
		pid: process.pid,
	});

	const config = loadSlicebotConfig();
	const services = createServices(config);
	services.sentimentWorker.start();

	const server = createHttpServer(
		createRouter({
			mode: services.clients.mode,
			engine: services.engine,
			execution: services.clients.execution,
			account: services.clients.account,
			commandParser: services.commandParser,
			sentiment: services.sentimentWorker,
		})
	);

	const port = config.env.port;
	server.listen(port, () => {
		logger.info("http_server_listening", { port, mode: services.clients.mode });
	});

	const shutdown = (signal: string): void => {
		logger.info("server_shutdown", { signal });
		server.close();
		services
			.shutdown()
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				logger.error("shutdown_failed", {
					message: error instanceof Error ? error.message : String(error),
				});
				process.exit(1);
			});
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));
};

main().catch((error: unknown) => {
	logger.error("server_fatal", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
