export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export class UnexpectedStatusError extends Error {
    readonly path: string;

    readonly status: number;

    constructor(path: string, status: number) {
        super(`GET ${path} returned HTTP ${status}`);
        this.name = "UnexpectedStatusError";
        this.path = path;
        this.status = status;
    }
}

export class MalformedPayloadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "MalformedPayloadError";
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
