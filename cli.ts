#!/usr/bin/env node

import { helpText, parseCliArgs, type ParsedCli } from "./smoke/config.js";
import { describeError } from "./smoke/errors.js";
import { runSmokeTests } from "./smoke/runner.js";

async function main() {
    let parsed: ParsedCli;
    try {
        parsed = parseCliArgs(process.argv.slice(2));
    } catch (error: unknown) {
        console.error(`[ERROR] ${describeError(error)}`);
        console.log(helpText());
        process.exitCode = 1;
        return;
    }

    if (parsed.help) {
        console.log(helpText());
        return;
    }

    // Probe failures are printed, never turned into an exit code.
    await runSmokeTests(parsed.config);
}

main().catch((error: unknown) => {
    console.error("[FATAL ERROR]:", error);
    process.exitCode = 1;
});
