import { afterEach, describe, expect, test } from "vitest";

import { defaultConfig, type SmokeConfig } from "../../smoke/config.js";
import { runSmokeTests } from "../../smoke/runner.js";
import { startMockServer, type MockServer, type MockServerOptions } from "./mock_server.js";
import { createTestOutput } from "./test_output.js";

const servers: MockServer[] = [];

afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.close()));
});

async function run(options: MockServerOptions = {}, config: Partial<SmokeConfig> = {}) {
    const server = await startMockServer(options);
    servers.push(server);
    const io = createTestOutput();
    await runSmokeTests({ ...defaultConfig, baseUrl: server.baseUrl, ...config }, { output: io.output });
    return { server, paths: server.requests.map((r) => r.path), ...io };
}

describe("Smoke test runner", () => {
    test("runs all six probes and ends with the usage summary", async () => {
        const { server, paths, stdoutLines, failureLines } = await run();

        expect(paths).toEqual([
            "/health",
            "/status",
            "/v1/models",
            "/v1/chat/completions",
            "/v1/chat/completions",
            "/v1/chat/completions",
        ]);
        expect(failureLines()).toEqual([]);
        expect(stdoutLines()).toContain("✅ All tests completed!");
        expect(stdoutLines().slice(-4)).toEqual([
            "💡 Any OpenAI-compatible client can now connect with:",
            `   Base URL: ${server.baseUrl}/v1`,
            "   API Key: any value (not checked by the server)",
            "   Model: apple-on-device",
        ]);
    });

    test("skips chat probes when the model is unavailable", async () => {
        const { paths, stdoutLines, failureLines } = await run({
            statusBody: { model_available: false, reason: "model not downloaded" },
        });

        expect(paths).toEqual(["/health", "/status", "/v1/models"]);
        expect(failureLines()).toEqual([]);
        expect(stdoutLines()).toContain("   Reason: model not downloaded");
        expect(stdoutLines()).toContain("⚠️  Model unavailable, skipping chat tests");
        expect(stdoutLines().at(-1)).toBe("3. The model download has finished");
    });

    test("stops after a failed health check", async () => {
        const { server, paths, failureLines } = await run({ healthStatus: 503 });

        expect(paths).toEqual(["/health"]);
        expect(failureLines()).toEqual([
            "❌ Health check failed: GET /health returned HTTP 503",
            `❌ Server unreachable, make sure it is running at ${server.baseUrl}`,
        ]);
    });

    test("prints failures on stdout in order with the other lines", async () => {
        const { server, stdoutLines } = await run({ healthStatus: 503 });

        expect(stdoutLines()).toEqual([
            "🚀 Starting on-device OpenAI-compatible server smoke tests",
            "=".repeat(60),
            `[INFO] Server: ${server.baseUrl}`,
            "[INFO] Model: apple-on-device",
            "",
            "🔍 Checking health...",
            "❌ Health check failed: GET /health returned HTTP 503",
            "",
            `❌ Server unreachable, make sure it is running at ${server.baseUrl}`,
        ]);
    });

    test("ends normally when the server is down", async () => {
        const server = await startMockServer();
        await server.close();
        const io = createTestOutput();

        await expect(
            runSmokeTests({ ...defaultConfig, baseUrl: server.baseUrl }, { output: io.output }),
        ).resolves.toBeUndefined();
        expect(io.failureLines().at(-1)).toBe(`❌ Server unreachable, make sure it is running at ${server.baseUrl}`);
    });

    test("keeps going after a model listing failure", async () => {
        const { paths, stdoutLines, failureLines } = await run({ modelsStatus: 500 });

        expect(paths).toHaveLength(6);
        expect(failureLines()).toEqual(["❌ Model listing failed: 500 model registry unavailable"]);
        expect(stdoutLines()).toContain("✅ All tests completed!");
    });

    test("treats a broken status endpoint as unavailable", async () => {
        const { paths, stdoutLines } = await run({ statusCode: 500 });

        expect(paths).toEqual(["/health", "/status", "/v1/models"]);
        expect(stdoutLines()).toContain("⚠️  Model unavailable, skipping chat tests");
    });

    test("counts failed chat probes in the completion banner", async () => {
        const { paths, stdoutLines, failureLines } = await run({ chatStatus: 500 });

        expect(paths).toHaveLength(6);
        expect(failureLines()).toHaveLength(3);
        expect(stdoutLines()).toContain("⚠️  Tests completed, 3 of 3 chat probes failed");
    });

    test("uses the configured model for every chat request", async () => {
        const { server, stdoutLines } = await run({}, { model: "apple-fm-creative" });

        const models = server.requests.flatMap((r) => (r.chat ? [r.chat.model] : []));
        expect(models).toEqual(["apple-fm-creative", "apple-fm-creative", "apple-fm-creative"]);
        expect(stdoutLines().at(-1)).toBe("   Model: apple-fm-creative");
    });
});
