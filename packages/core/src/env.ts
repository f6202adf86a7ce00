import { config as dotenvConfig } from "dotenv";
import fs from "node:fs";
import path from "node:path";

const loadedEnvFiles = new Set<string>();

/**
 * Candidate env files in load order. dotenv never overrides a variable
 * that is already set, so the first file to define a key wins and the
 * process environment beats every file.
 */
export const envFileCandidates = (explicitPath?: string): string[] => {
	const candidates = [
		explicitPath,
		process.env.SLICEBOT_ENV_FILE,
		".env",
		".env.local",
	];
	const seen = new Set<string>();
	for (const candidate of candidates) {
		if (candidate && candidate.trim().length) {
			seen.add(candidate.trim());
		}
	}
	return Array.from(seen);
};

/**
 * Load every existing candidate relative to `projectRoot`. Returns the
 * absolute paths loaded by this call; a file is only ever read once per
 * process.
 */
export const loadEnvFiles = (
	projectRoot: string,
	explicitPath?: string
): string[] => {
	const loadedNow: string[] = [];
	for (const candidate of envFileCandidates(explicitPath)) {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (loadedEnvFiles.has(fullPath) || !fs.existsSync(fullPath)) {
			continue;
		}
		dotenvConfig({ path: fullPath });
		loadedEnvFiles.add(fullPath);
		loadedNow.push(fullPath);
	}
	return loadedNow;
};
