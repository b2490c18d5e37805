export type ArgValue = string | boolean;

export interface ParsedCli {
	command: string | undefined;
	args: Record<string, ArgValue>;
}

/** `--key value`, `--key=value` and bare `--flag`; the first positional is the command. */
export const parseCliArgs = (argv: readonly string[]): ParsedCli => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (token === undefined) {
			continue;
		}
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[1] && args.session === undefined) {
		args.session = positionals[1];
	}
	return { command: positionals[0], args };
};

export const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

/** `ES=ES/USDT:USDT,NQ=NQ/USDT:USDT` into an instrument to market map. */
export const parseMarketMap = (value: string | undefined): Record<string, string> => {
	const markets: Record<string, string> = {};
	for (const entry of (value ?? "").split(",")) {
		const eqIdx = entry.indexOf("=");
		if (eqIdx <= 0) {
			continue;
		}
		const instrument = entry.slice(0, eqIdx).trim();
		const market = entry.slice(eqIdx + 1).trim();
		if (instrument && market) {
			markets[instrument] = market;
		}
	}
	return markets;
};

export const getNumberArg = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const value = getStringArg(args, key);
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number(value);
	return Number.isFinite(parsed) ? parsed : undefined;
};
