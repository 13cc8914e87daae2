import { parseArgs } from "node:util";

import { ConfigError } from "./errors.js";

// =====================
// Defaults
// =====================
export const DEFAULT_BASE_URL = "http://127.0.0.1:11535";
export const DEFAULT_MODEL = "apple-on-device";

// The server ignores the key, but the SDK refuses to build a client without one.
export const PLACEHOLDER_API_KEY = "not used";

export type SmokeConfig = {
    baseUrl: string;
    model: string;
    apiKey: string;
    verbose: boolean;
};

export type ParsedCli = {
    help: boolean;
    config: SmokeConfig;
};

export const defaultConfig: SmokeConfig = {
    baseUrl: DEFAULT_BASE_URL,
    model: DEFAULT_MODEL,
    apiKey: PLACEHOLDER_API_KEY,
    verbose: false,
};

export function apiBaseUrl(config: SmokeConfig): string {
    return `${config.baseUrl}/v1`;
}

export function normalizeBaseUrl(raw: string): string {
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new ConfigError(`Invalid base URL: ${raw}`);
    }

    if (!/^https?:$/.test(url.protocol)) {
        throw new ConfigError(`Only http/https base URLs are supported: ${raw}`);
    }

    url.hash = "";
    url.search = "";
    return url.toString().replace(/\/+$/, "");
}

export function helpText(): string {
    return `
./on-device-smoke [options]

Smoke tests for the local OpenAI-compatible server backed by the on-device model.
Runs health, status, model listing, multi-turn chat, Chinese chat and streaming checks.

Options:
  --base-url <url>    Server address (default: ${DEFAULT_BASE_URL})
  --model <model>     Model id for chat requests (default: ${DEFAULT_MODEL})
  --verbose           Print raw stream chunks and finish reasons
  --help              Show this help message

Examples:
  ./on-device-smoke
  ./on-device-smoke --base-url http://127.0.0.1:11536
  ./on-device-smoke --model apple-fm-creative --verbose

The server must already be running; nothing is retried while it starts up.
`;
}

function readFlags(args: string[]) {
    try {
        return parseArgs({
            args,
            options: {
                "base-url": { type: "string" },
                model: { type: "string" },
                verbose: { type: "boolean" },
                help: { type: "boolean" },
            },
            strict: true,
            allowPositionals: false,
        }).values;
    } catch (e: unknown) {
        throw new ConfigError(e instanceof Error ? e.message : String(e));
    }
}

export function parseCliArgs(args: string[]): ParsedCli {
    const values = readFlags(args);
    const model = values.model?.trim();

    if (values.model !== undefined && !model) {
        throw new ConfigError("--model must not be empty");
    }

    return {
        help: values.help ?? false,
        config: {
            ...defaultConfig,
            baseUrl: normalizeBaseUrl(values["base-url"] ?? DEFAULT_BASE_URL),
            model: model || DEFAULT_MODEL,
            verbose: values.verbose ?? false,
        },
    };
}
