import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { ConfigError } from "./errors";
import type { ExecutionMode } from "./types";

export type ConfigSourceType = "file" | "env" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = configMetadata.get(config) ?? {};
	configMetadata.set(config, { ...existing, ...metadata });
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	configMetadata.get(config) ?? null;

let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [path.join("config", "engine"), ".git"];

export interface EnvConfig {
	executionMode: ExecutionMode;
	binanceApiKey: string;
	binanceApiSecret: string;
	defaultSymbol?: string;
	ollamaHost: string;
	ollamaModel: string;
	port: number;
}

export interface ExchangeConfig {
	id: string;
	exchange: string;
	testnet: boolean;
	defaultSymbol: string;
	requestTimeoutMs: number;
	recvWindow: number;
	credentials: {
		apiKey: string;
		apiSecret: string;
	};
}

export interface EngineConfig {
	/** Decimal places a TWAP total is split at. */
	quantityPrecision: number;
	maxConditionSkips: number;
	maxRetries: number;
	retryBaseDelayMs: number;
	retryMaxDelayMs: number;
	requestTimeoutMs: number;
	gridPollIntervalMs: number;
	rsiPeriod: number;
	rsiInterval: string;
	rsiLookback: number;
}

export interface SentimentSourceWeights {
	news: number;
	reddit: number;
	twitter: number;
}

export interface SentimentConfig {
	pollIntervalMs: number;
	timeDecayHours: number;
	sourceWeights: SentimentSourceWeights;
	subreddits: string[];
	postLimit: number;
	userAgent: string;
}

export interface SlicebotConfig {
	env: EnvConfig;
	exchange: ExchangeConfig;
	engine: EngineConfig;
	sentiment: SentimentConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	exchangeProfile?: string;
	engineProfile?: string;
	sentimentProfile?: string;
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const getEnvVar = (key: string, fallback: string): string =>
	readOptionalEnvVar(key) ?? fallback;

const normalizeExecutionMode = (value: string | undefined): ExecutionMode => {
	return value?.toLowerCase() === "live" ? "live" : "paper";
};

const parsePort = (value: string | undefined): number => {
	const port = Number(value);
	return Number.isInteger(port) && port > 0 ? port : 3000;
};

const readJsonFile = (filePath: string): JsonRecord => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigError(`Config file not found: ${filePath}`);
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(
			`Config file ${filePath} is not valid JSON: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`Config file ${filePath} must contain an object`);
	}
	return parsed;
};

const ensureNumber = (
	file: JsonRecord,
	key: string,
	field: string,
	fallback?: number
): number => {
	const value = file[key] ?? fallback;
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new ConfigError(`Required numeric field missing in ${field}`);
	}
	return value;
};

const ensurePositive = (
	file: JsonRecord,
	key: string,
	field: string,
	fallback?: number
): number => {
	const value = ensureNumber(file, key, field, fallback);
	if (value <= 0) {
		throw new ConfigError(`${field} must be positive, got ${value}`);
	}
	return value;
};

const ensureString = (
	file: JsonRecord,
	key: string,
	field: string,
	fallback?: string
): string => {
	const value = file[key] ?? fallback;
	if (typeof value !== "string" || value.trim().length === 0) {
		throw new ConfigError(`Required string field missing in ${field}`);
	}
	return value.trim();
};

const ensureStringList = (
	file: JsonRecord,
	key: string,
	field: string,
	fallback: string[]
): string[] => {
	const value = file[key] ?? fallback;
	if (!Array.isArray(value)) {
		throw new ConfigError(`${field} must be a list of strings`);
	}
	return value.filter(
		(entry): entry is string => typeof entry === "string" && entry.length > 0
	);
};

export const loadEnvConfig = (envPath?: string): EnvConfig => {
	loadEnvFiles(findWorkspaceRoot(), envPath);

	return {
		executionMode: normalizeExecutionMode(readOptionalEnvVar("EXECUTION_MODE")),
		binanceApiKey: getEnvVar("BINANCE_API_KEY", ""),
		binanceApiSecret: getEnvVar("BINANCE_API_SECRET", ""),
		defaultSymbol: readOptionalEnvVar("DEFAULT_SYMBOL"),
		ollamaHost: getEnvVar("OLLAMA_HOST", "http://localhost:11434"),
		ollamaModel: getEnvVar("OLLAMA_MODEL", "llama3.1:8b"),
		port: parsePort(readOptionalEnvVar("PORT")),
	};
};

export const loadExchangeConfig = (
	env: EnvConfig,
	configDir = getDefaultConfigDir(),
	exchangeProfile = "binance-testnet"
): ExchangeConfig => {
	const exchangePath = path.join(configDir, "exchange", `${exchangeProfile}.json`);
	const file = readJsonFile(exchangePath);
	return withConfigMetadata(
		{
			id: exchangeProfile,
			exchange: ensureString(file, "exchange", "exchange.exchange"),
			testnet: file.testnet !== false,
			defaultSymbol:
				env.defaultSymbol ??
				ensureString(file, "defaultSymbol", "exchange.defaultSymbol"),
			requestTimeoutMs: ensurePositive(
				file,
				"requestTimeoutMs",
				"exchange.requestTimeoutMs",
				15_000
			),
			recvWindow: ensurePositive(file, "recvWindow", "exchange.recvWindow", 5_000),
			credentials: {
				apiKey: env.binanceApiKey,
				apiSecret: env.binanceApiSecret,
			},
		},
		{
			source: "file",
			path: exchangePath,
			profile: exchangeProfile,
		}
	);
};

export const loadEngineConfig = (
	configDir = getDefaultConfigDir(),
	engineProfile = "default"
): EngineConfig => {
	const enginePath = path.join(configDir, "engine", `${engineProfile}.json`);
	const file = readJsonFile(enginePath);
	const quantityPrecision = ensureNumber(
		file,
		"quantityPrecision",
		"engine.quantityPrecision"
	);
	if (!Number.isInteger(quantityPrecision) || quantityPrecision < 0) {
		throw new ConfigError(
			`engine.quantityPrecision must be a non-negative integer, got ${quantityPrecision}`
		);
	}
	return withConfigMetadata(
		{
			quantityPrecision,
			maxConditionSkips: ensurePositive(
				file,
				"maxConditionSkips",
				"engine.maxConditionSkips"
			),
			maxRetries: ensureNumber(file, "maxRetries", "engine.maxRetries"),
			retryBaseDelayMs: ensurePositive(
				file,
				"retryBaseDelayMs",
				"engine.retryBaseDelayMs"
			),
			retryMaxDelayMs: ensurePositive(
				file,
				"retryMaxDelayMs",
				"engine.retryMaxDelayMs"
			),
			requestTimeoutMs: ensurePositive(
				file,
				"requestTimeoutMs",
				"engine.requestTimeoutMs"
			),
			gridPollIntervalMs: ensurePositive(
				file,
				"gridPollIntervalMs",
				"engine.gridPollIntervalMs"
			),
			rsiPeriod: ensurePositive(file, "rsiPeriod", "engine.rsiPeriod", 14),
			rsiInterval: ensureString(file, "rsiInterval", "engine.rsiInterval", "1h"),
			rsiLookback: ensurePositive(file, "rsiLookback", "engine.rsiLookback", 50),
		},
		{
			source: "file",
			path: enginePath,
			profile: engineProfile,
		}
	);
};

export const loadSentimentConfig = (
	configDir = getDefaultConfigDir(),
	sentimentProfile = "default"
): SentimentConfig => {
	const sentimentPath = path.join(
		configDir,
		"sentiment",
		`${sentimentProfile}.json`
	);
	const file = readJsonFile(sentimentPath);
	const weights: JsonRecord = isRecord(file.sourceWeights)
		? file.sourceWeights
		: {};
	return withConfigMetadata(
		{
			pollIntervalMs: ensurePositive(
				file,
				"pollIntervalMs",
				"sentiment.pollIntervalMs"
			),
			timeDecayHours: ensurePositive(
				file,
				"timeDecayHours",
				"sentiment.timeDecayHours",
				24
			),
			sourceWeights: {
				news: ensureNumber(weights, "news", "sentiment.sourceWeights.news", 0.5),
				reddit: ensureNumber(
					weights,
					"reddit",
					"sentiment.sourceWeights.reddit",
					0.3
				),
				twitter: ensureNumber(
					weights,
					"twitter",
					"sentiment.sourceWeights.twitter",
					0.2
				),
			},
			subreddits: ensureStringList(file, "subreddits", "sentiment.subreddits", [
				"CryptoCurrency",
			]),
			postLimit: ensurePositive(file, "postLimit", "sentiment.postLimit", 25),
			userAgent: getEnvVar(
				"REDDIT_USER_AGENT",
				ensureString(file, "userAgent", "sentiment.userAgent", "slicebot/0.1")
			),
		},
		{
			source: "merged",
			path: sentimentPath,
			profile: sentimentProfile,
		}
	);
};

export const loadSlicebotConfig = (
	options: ConfigLoadOptions = {}
): SlicebotConfig => {
	const configDir = options.configDir ?? getDefaultConfigDir();
	const env = withConfigMetadata(loadEnvConfig(options.envPath), {
		source: "env",
		path: options.envPath,
	});
	return {
		env,
		exchange: loadExchangeConfig(env, configDir, options.exchangeProfile),
		engine: loadEngineConfig(configDir, options.engineProfile),
		sentiment: loadSentimentConfig(configDir, options.sentimentProfile),
	};
};
