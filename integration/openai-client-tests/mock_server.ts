import http from "node:http";

import { z } from "zod";

/**
 * In-process stand-in for the on-device server: /health, /status,
 * /v1/models and /v1/chat/completions (JSON and SSE).
 */

const chatRequestSchema = z.object({
    model: z.string(),
    messages: z.array(z.object({ role: z.string(), content: z.string() })),
    max_tokens: z.number().optional(),
    stream: z.boolean().optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export type RecordedRequest = {
    method: string;
    path: string;
    chat?: ChatRequest;
};

export type MockServerOptions = {
    healthStatus?: number;
    statusCode?: number;
    /** JSON-encoded unless it is already a string. */
    statusBody?: unknown;
    modelsStatus?: number;
    models?: string[];
    chatStatus?: number;
    reply?: (request: ChatRequest) => string;
    streamFragments?: string[];
};

export type MockServer = {
    baseUrl: string;
    requests: RecordedRequest[];
    close(): Promise<void>;
};

export const AVAILABLE_STATUS = {
    model_available: true,
    reason: "ok",
    supported_languages: ["en", "zh"],
};

export const COMPLETION_ID = "chatcmpl-test-1";

const CREATED = 1_700_000_000;

function lastUserContent(request: ChatRequest): string {
    const users = request.messages.filter((m) => m.role === "user");
    return users[users.length - 1]?.content ?? "";
}

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
    res.writeHead(status, { "Content-Type": "application/json; charset=utf-8" });
    res.end(typeof body === "string" ? body : JSON.stringify(body));
}

function readBody(req: http.IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        req.on("data", (c: Buffer) => chunks.push(c));
        req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
        req.on("error", reject);
    });
}

function writeStream(res: http.ServerResponse, model: string, fragments: string[]) {
    res.writeHead(200, { "Content-Type": "text/event-stream", "Cache-Control": "no-cache" });
    const chunk = (delta: Record<string, string>, finishReason: string | null) => ({
        id: COMPLETION_ID,
        object: "chat.completion.chunk",
        created: CREATED,
        model,
        choices: [{ index: 0, delta, finish_reason: finishReason }],
    });
    for (const fragment of fragments) {
        res.write(`data: ${JSON.stringify(chunk({ content: fragment }, null))}\n\n`);
    }
    res.write(`data: ${JSON.stringify(chunk({}, "stop"))}\n\n`);
    res.end("data: [DONE]\n\n");
}

export async function startMockServer(options: MockServerOptions = {}): Promise<MockServer> {
    const requests: RecordedRequest[] = [];
    const reply = options.reply ?? ((request: ChatRequest) => `Echo: ${lastUserContent(request)}`);

    const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
        const method = req.method ?? "GET";
        const path = req.url ?? "/";

        if (method === "GET" && path === "/health") {
            requests.push({ method, path });
            res.writeHead(options.healthStatus ?? 200);
            res.end();
            return;
        }

        if (method === "GET" && path === "/status") {
            requests.push({ method, path });
            sendJson(res, options.statusCode ?? 200, options.statusBody ?? AVAILABLE_STATUS);
            return;
        }

        if (method === "GET" && path === "/v1/models") {
            requests.push({ method, path });
            const status = options.modelsStatus ?? 200;
            if (status !== 200) {
                sendJson(res, status, { error: { message: "model registry unavailable" } });
                return;
            }
            sendJson(res, 200, {
                object: "list",
                data: (options.models ?? ["apple-fm-base"]).map((id) => ({
                    id,
                    object: "model",
                    created: CREATED,
                    owned_by: "apple-on-device-openai",
                })),
            });
            return;
        }

        if (method === "POST" && path === "/v1/chat/completions") {
            const chat = chatRequestSchema.parse(JSON.parse(await readBody(req)));
            requests.push({ method, path, chat });

            const status = options.chatStatus ?? 200;
            if (status !== 200) {
                sendJson(res, status, { error: { message: "engine crashed" } });
                return;
            }

            if (chat.stream) {
                writeStream(res, chat.model, options.streamFragments ?? ["Once ", "upon ", "a time."]);
                return;
            }

            sendJson(res, 200, {
                id: COMPLETION_ID,
                object: "chat.completion",
                created: CREATED,
                model: chat.model,
                choices: [
                    {
                        index: 0,
                        message: { role: "assistant", content: reply(chat) },
                        finish_reason: "stop",
                    },
                ],
            });
            return;
        }

        requests.push({ method, path });
        res.writeHead(404);
        res.end("Not Found");
    };

    const server = http.createServer((req, res) => {
        handle(req, res).catch((error: unknown) => {
            sendJson(res, 400, { error: { message: String(error) } });
        });
    });

    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
        throw new Error("Mock server is not listening on a TCP port");
    }

    return {
        baseUrl: `http://127.0.0.1:${address.port}`,
        requests,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.closeAllConnections();
                server.close((error) => (error ? reject(error) : resolve()));
            }),
    };
}
