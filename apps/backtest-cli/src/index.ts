#!/usr/bin/env tsx

import path from "node:path";
import process from "node:process";
import {
	configureLogging,
	createLogger,
	createRotationConfig,
	getWorkspaceRoot,
	loadBacktestConfig,
} from "@gold-rotation/core";
import { createPriceAcquisition } from "@gold-rotation/data";
import { createPersistenceLayer } from "@gold-rotation/persistence";
import {
	USAGE,
	parseCliArgs,
	readConfigLocation,
	resolveBacktestArgs,
} from "./cliArgs";
import { describeFailure } from "./failure";
import { formatBacktestReport, runBacktest } from "./runBacktest";

const main = async (): Promise<void> => {
	const argMap = parseCliArgs(process.argv.slice(2));
	if (argMap.help) {
		console.log(USAGE);
		return;
	}

	const location = readConfigLocation(argMap);
	const config = loadBacktestConfig({
		envPath: location.envPath,
		configDir: location.configDir,
		rotationProfile: location.profile,
	});
	configureLogging();
	const args = resolveBacktestArgs(argMap, config.env);
	const rotation = createRotationConfig({
		...config.rotation,
		...args.rotationOverrides,
	});

	const acquisition = createPriceAcquisition({
		cacheDir: config.env.dataDir,
		goldSymbol: args.goldSymbol,
		retries: config.env.fetchRetries,
		backoffSeconds: config.env.fetchBackoffSeconds,
		logger: createLogger("data"),
	});
	const persistence = createPersistenceLayer({ outputDir: config.env.outputDir });

	if (!args.json) {
		console.log(
			`Running rotation backtest ${args.goldSymbol} vs ${args.equitySymbol} from ${args.start}...`
		);
	}
	const outcome = await runBacktest(
		{
			goldSymbol: args.goldSymbol,
			equitySymbol: args.equitySymbol,
			start: args.start,
			end: args.end,
			instrumentType: args.instrumentType,
			useCache: args.useCache,
			rotation,
		},
		{ acquisition, persistence, logger: createLogger("backtest-cli") }
	);

	if (args.json) {
		console.log(
			JSON.stringify(
				{
					request: outcome.request,
					goldRows: outcome.goldRows,
					equityRows: outcome.equityRows,
					report: outcome.report,
					outputPath: outcome.outputPath,
				},
				null,
				2
			)
		);
		return;
	}
	console.log(formatBacktestReport(outcome));
	const relative =
		path.relative(getWorkspaceRoot(), outcome.outputPath) || outcome.outputPath;
	console.log(`📤 Signal table saved to ${relative}`);
};

main().catch((error: unknown) => {
	const failure = describeFailure(error);
	for (const line of failure.lines) {
		console.error(line);
	}
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = failure.exitCode;
});
