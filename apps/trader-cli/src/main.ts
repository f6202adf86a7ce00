#!/usr/bin/env tsx
import { createServices, type SlicebotServices } from "@slicebot/app-di";
import { createLogger, loadSlicebotConfig } from "@slicebot/core";
import { validateOrderRequest } from "@slicebot/strategy-engine";
import { parseCliArgs, getBooleanArg, getStringArg, type CliArgs } from "./cliArgs";
import {
	USAGE,
	buildGridInput,
	buildOrderInput,
	buildTwapInput,
	needsSentimentFeed,
} from "./commands";
import {
	formatAccount,
	formatConfig,
	formatOrder,
	formatRun,
	formatSentiment,
} from "./format";

const logger = createLogger("trader-cli");

/**
 * Submit a run and wait for it. Ctrl-C asks the engine to cancel; orders
 * already sent stay on the book. Sentiment-gated runs keep the sentiment
 * worker polling until shutdown.
 */
const runStrategy = async (
	services: SlicebotServices,
	input: unknown
): Promise<void> => {
	const { engine, sentimentWorker } = services;
	if (
		needsSentimentFeed(input, services.config.engine.quantityPrecision) &&
		!sentimentWorker.isRunning()
	) {
		sentimentWorker.start();
	}
	const runId = engine.submit(input);
	const onInterrupt = (): void => {
		console.log(`\ncancelling ${runId}...`);
		engine.cancel(runId);
	};
	process.once("SIGINT", onInterrupt);
	try {
		const state = await engine.whenSettled(runId);
		console.log(formatRun(state));
		if (state.status === "FAILED") {
			process.exitCode = 1;
		}
	} finally {
		process.off("SIGINT", onInterrupt);
	}
};

const runOrder = async (services: SlicebotServices, args: CliArgs): Promise<void> => {
	const request = validateOrderRequest(
		buildOrderInput(args, services.config.exchange.defaultSymbol)
	);
	const order = await services.clients.execution.placeOrder(request);
	console.log(formatOrder(order));
};

const runAsk = async (services: SlicebotServices, args: CliArgs): Promise<void> => {
	const text = args.positionals.join(" ");
	const parsed = await services.commandParser.parse(text);
	const payload = parsed.intent === "market" ? parsed.order : parsed.spec;
	console.log(
		`${parsed.intent} (confidence ${parsed.confidence.toFixed(2)})\n${JSON.stringify(payload, null, 2)}`
	);
	if (!getBooleanArg(args, "yes")) {
		console.log("re-run with --yes to execute");
		return;
	}
	if (parsed.intent === "market") {
		console.log(formatOrder(await services.clients.execution.placeOrder(parsed.order)));
		return;
	}
	await runStrategy(services, parsed.spec);
};

const runSentiment = async (
	services: SlicebotServices,
	args: CliArgs
): Promise<void> => {
	const symbol = (
		args.positionals[0] ??
		getStringArg(args, "symbol") ??
		services.config.exchange.defaultSymbol
	).toUpperCase();
	await services.sentimentWorker.pollOnce([symbol]);
	console.log(formatSentiment(symbol, services.sentimentWorker.getReading(symbol)));
};

const runAccount = async (services: SlicebotServices): Promise<void> => {
	const account = await services.clients.account.getAccount();
	console.log(formatAccount(services.clients.mode, account));
};

const dispatch = async (services: SlicebotServices, args: CliArgs): Promise<void> => {
	const defaultSymbol = services.config.exchange.defaultSymbol;
	switch (args.command) {
		case "order":
			return runOrder(services, args);
		case "twap":
			return runStrategy(services, buildTwapInput(args, defaultSymbol));
		case "grid":
			return runStrategy(services, buildGridInput(args, defaultSymbol));
		case "ask":
			return runAsk(services, args);
		case "sentiment":
			return runSentiment(services, args);
		case "account":
			return runAccount(services);
		case "config":
			console.log(formatConfig(services.config));
			return;
		default:
			console.log(USAGE);
			if (args.command) {
				process.exitCode = 1;
			}
	}
};

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	const config = loadSlicebotConfig({
		envPath: getStringArg(args, "env"),
		exchangeProfile: getStringArg(args, "exchange"),
		engineProfile: getStringArg(args, "engine"),
	});
	const services = createServices(config);
	logger.info("cli_starting", {
		command: args.command ?? null,
		mode: services.clients.mode,
		testnet: config.exchange.testnet,
	});
	try {
		await dispatch(services, args);
	} finally {
		await services.shutdown();
	}
};

main().catch((error: unknown) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	console.error(error instanceof Error ? error.message : String(error));
	process.exit(1);
});
