export type ArgValue = string | boolean;

export interface CliArgs {
	command?: string;
	positionals: string[];
	flags: Record<string, ArgValue>;
}

export const parseCliArgs = (argv: string[]): CliArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			flags[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	const [command, ...rest] = positionals;
	return { command, positionals: rest, flags };
};

export const getStringArg = (
	args: CliArgs,
	key: string
): string | undefined => {
	const value = args.flags[key];
	return typeof value === "string" && value.length ? value : undefined;
};

/** Numbers stay unvalidated here; NaN is reported by strategy validation. */
export const getNumberArg = (
	args: CliArgs,
	key: string
): number | undefined => {
	const raw = getStringArg(args, key);
	return raw === undefined ? undefined : Number(raw);
};

export const getBooleanArg = (args: CliArgs, key: string): boolean => {
	const value = args.flags[key];
	return value === true || value === "true";
};
