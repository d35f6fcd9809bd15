#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<void> {
	await createProgram().parseAsync(process.argv);
}

main().catch((err) => {
	logger.fatal({ err }, "devexplain crashed");
	process.exit(1);
});
