import { apiBaseUrl, type SmokeConfig } from "./config.js";
import {
    createProbeContext,
    probeChineseConversation,
    probeHealth,
    probeModels,
    probeMultiTurnChat,
    probeStatus,
    probeStreaming,
    type ProbeOverrides,
} from "./probes.js";

const RULE = "=".repeat(60);

/**
 * Runs every probe in order against `config.baseUrl` and prints the outcome.
 *
 * A failed health check ends the run; chat and streaming probes only run
 * when the status endpoint reports the model as available. Nothing here
 * throws for a failed probe, and no result is returned.
 */
export async function runSmokeTests(config: SmokeConfig, overrides: ProbeOverrides = {}): Promise<void> {
    const ctx = createProbeContext(config, overrides);
    const { output } = ctx;

    const section = (title: string) => {
        output.print("");
        output.print(RULE);
        output.print(title);
        output.print(RULE);
    };

    output.print("🚀 Starting on-device OpenAI-compatible server smoke tests");
    output.print(RULE);
    output.print(`[INFO] Server: ${config.baseUrl}`);
    output.print(`[INFO] Model: ${config.model}`);
    output.print("");

    if (!(await probeHealth(ctx))) {
        output.print("");
        output.print(`❌ Server unreachable, make sure it is running at ${config.baseUrl}`);
        return;
    }

    output.print("");
    const modelAvailable = await probeStatus(ctx);

    output.print("");
    await probeModels(ctx);

    if (!modelAvailable) {
        output.print("");
        output.print("⚠️  Model unavailable, skipping chat tests");
        output.print("Make sure that:");
        output.print("1. The device supports Apple Intelligence");
        output.print("2. Apple Intelligence is enabled in Settings");
        output.print("3. The model download has finished");
        return;
    }

    section("🤖 Model available, starting chat tests");
    const chatResults: boolean[] = [];
    chatResults.push(await probeMultiTurnChat(ctx));
    output.print("");
    chatResults.push(await probeChineseConversation(ctx));

    section("🌊 Testing streaming");
    chatResults.push(await probeStreaming(ctx));

    const failed = chatResults.filter((ok) => !ok).length;
    section(failed === 0 ? "✅ All tests completed!" : `⚠️  Tests completed, ${failed} of ${chatResults.length} chat probes failed`);

    output.print("");
    output.print("💡 Any OpenAI-compatible client can now connect with:");
    output.print(`   Base URL: ${apiBaseUrl(config)}`);
    output.print("   API Key: any value (not checked by the server)");
    output.print(`   Model: ${config.model}`);
}
