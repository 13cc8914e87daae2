import fetch from "node-fetch";
import OpenAI from "openai";

import { apiBaseUrl, type SmokeConfig } from "./config.js";
import { describeError, MalformedPayloadError, UnexpectedStatusError } from "./errors.js";
import { consoleOutput, type Output } from "./output.js";
import { parseServerStatus } from "./status.js";
import { formatMs, summarizeStream } from "./timing.js";

// =====================
// Request shapes
// =====================
export const CHAT_MAX_TOKENS = 200;
export const STREAM_MAX_TOKENS = 150;

export const MULTI_TURN_PROMPTS = {
    question: "What are the benefits of on-device AI?",
    answer:
        "On-device AI offers several key benefits including improved privacy, faster response times, reduced reliance on internet connectivity, and better data security since processing happens locally on your device.",
    followUp: "Can you elaborate on the privacy benefits?",
};

export const CHINESE_PROMPT = "你好！请用中文解释一下什么是苹果智能。";

export const STREAM_PROMPT = "Tell me a short story about AI helping humans.";

export type ProbeContext = {
    config: SmokeConfig;
    client: OpenAI;
    output: Output;
    clock: () => number;
};

export type ProbeOverrides = Partial<Pick<ProbeContext, "output" | "clock">>;

export function createClient(config: SmokeConfig): OpenAI {
    return new OpenAI({
        baseURL: apiBaseUrl(config),
        apiKey: config.apiKey,
        maxRetries: 0,
    });
}

export function createProbeContext(config: SmokeConfig, overrides: ProbeOverrides = {}): ProbeContext {
    return {
        config,
        client: createClient(config),
        output: overrides.output ?? consoleOutput,
        clock: overrides.clock ?? (() => performance.now()),
    };
}

function messageContent(completion: OpenAI.Chat.ChatCompletion): string {
    const content = completion.choices[0]?.message?.content;
    if (typeof content !== "string" || content.length === 0) {
        throw new MalformedPayloadError("Chat completion did not include message content");
    }
    return content;
}

function debugFinishReason(ctx: ProbeContext, completion: OpenAI.Chat.ChatCompletion) {
    if (ctx.config.verbose) {
        ctx.output.print(`[DEBUG] finish_reason: ${completion.choices[0]?.finish_reason ?? "none"}`);
    }
}

// =====================
// Probes
// =====================
export async function probeHealth(ctx: ProbeContext): Promise<boolean> {
    const { output, config } = ctx;
    output.print("🔍 Checking health...");

    let status: number;
    try {
        const response = await fetch(`${config.baseUrl}/health`);
        status = response.status;
    } catch (e: unknown) {
        output.print(`❌ Connection failed: ${describeError(e)}`);
        return false;
    }

    if (status !== 200) {
        output.print(`❌ Health check failed: ${new UnexpectedStatusError("/health", status).message}`);
        return false;
    }

    output.print("✅ Health check passed");
    return true;
}

/** Resolves to the server's model availability flag; any failure counts as unavailable. */
export async function probeStatus(ctx: ProbeContext): Promise<boolean> {
    const { output, config } = ctx;
    output.print("🔍 Checking server status...");

    try {
        const response = await fetch(`${config.baseUrl}/status`);
        if (response.status !== 200) {
            throw new UnexpectedStatusError("/status", response.status);
        }
        const status = parseServerStatus(await response.json());

        output.print("✅ Status check passed");
        output.print(`   Model available: ${status.model_available}`);
        output.print(`   Reason: ${status.reason}`);
        output.print(`   Supported languages: ${status.supported_languages.length}`);
        if (status.server_version !== undefined) {
            output.print(`   Server version: ${status.server_version}`);
        }
        if (status.apple_intelligence_compatible !== undefined) {
            output.print(`   Apple Intelligence compatible: ${status.apple_intelligence_compatible}`);
        }
        return status.model_available;
    } catch (e: unknown) {
        output.print(`❌ Status check failed: ${describeError(e)}`);
        return false;
    }
}

export async function probeModels(ctx: ProbeContext): Promise<boolean> {
    const { output, client } = ctx;
    output.print("🔍 Listing models...");

    try {
        const models = await client.models.list();
        output.print(`✅ Models listed: ${models.data.length}`);
        for (const model of models.data) {
            output.print(`   - ${model.id}`);
        }
        return true;
    } catch (e: unknown) {
        output.print(`❌ Model listing failed: ${describeError(e)}`);
        return false;
    }
}

export async function probeMultiTurnChat(ctx: ProbeContext): Promise<boolean> {
    const { output, client, config } = ctx;
    output.print("🔍 Testing multi-turn chat completion...");

    try {
        const completion = await client.chat.completions.create({
            model: config.model,
            messages: [
                { role: "user", content: MULTI_TURN_PROMPTS.question },
                { role: "assistant", content: MULTI_TURN_PROMPTS.answer },
                { role: "user", content: MULTI_TURN_PROMPTS.followUp },
            ],
            max_tokens: CHAT_MAX_TOKENS,
        });
        const content = messageContent(completion);

        output.print("✅ Multi-turn chat completion succeeded");
        output.print(`   Response ID: ${completion.id}`);
        output.print(`   Model: ${completion.model}`);
        output.print(`   Response: ${content}`);
        debugFinishReason(ctx, completion);
        return true;
    } catch (e: unknown) {
        output.print(`❌ Multi-turn chat completion failed: ${describeError(e)}`);
        return false;
    }
}

export async function probeChineseConversation(ctx: ProbeContext): Promise<boolean> {
    const { output, client, config } = ctx;
    output.print("🔍 Testing Chinese conversation...");

    try {
        const completion = await client.chat.completions.create({
            model: config.model,
            messages: [{ role: "user", content: CHINESE_PROMPT }],
            max_tokens: CHAT_MAX_TOKENS,
        });
        const content = messageContent(completion);

        output.print("✅ Chinese conversation succeeded");
        output.print(`   Response: ${content}`);
        debugFinishReason(ctx, completion);
        return true;
    } catch (e: unknown) {
        output.print(`❌ Chinese conversation failed: ${describeError(e)}`);
        return false;
    }
}

export async function probeStreaming(ctx: ProbeContext): Promise<boolean> {
    const { output, client, config, clock } = ctx;
    output.print("🔍 Testing streaming chat completion...");

    // Set once fragments have been written without a trailing newline.
    let midLine = false;

    try {
        const startedAt = clock();
        const stream = await client.chat.completions.create({
            model: config.model,
            messages: [{ role: "user", content: STREAM_PROMPT }],
            max_tokens: STREAM_MAX_TOKENS,
            stream: true,
        });
        output.print("✅ Stream opened");

        const arrivals: number[] = [];
        let fullResponse = "";
        let fragmentCount = 0;

        for await (const chunk of stream) {
            arrivals.push(clock());

            if (config.verbose) {
                if (midLine) {
                    output.write("\n");
                    midLine = false;
                }
                output.print(`[DEBUG] Received chunk #${arrivals.length}: ${JSON.stringify(chunk)}`);
            }

            const content = chunk.choices[0]?.delta?.content;
            if (content) {
                if (!midLine) {
                    output.write("   ");
                    midLine = true;
                }
                output.write(content);
                fullResponse += content;
                fragmentCount++;
            }
        }

        if (midLine) {
            output.write("\n");
            midLine = false;
        }

        output.print(`✅ Stream completed with ${fragmentCount} fragments`);
        output.print(`   Full response: ${fullResponse}`);

        const timings = summarizeStream(startedAt, arrivals);
        if (timings.timeToFirstChunkMs !== null) {
            output.print(`   Time to first chunk: ${formatMs(timings.timeToFirstChunkMs)}`);
            output.print(`   Stream duration: ${formatMs(timings.durationMs)}`);
        }
        if (timings.gapCount > 0) {
            output.print(`   Inter-chunk gap (median): ${formatMs(timings.medianGapMs)}`);
            output.print(`   Inter-chunk gap (p95): ${formatMs(timings.p95GapMs)}`);
        }
        return true;
    } catch (e: unknown) {
        if (midLine) {
            output.write("\n");
        }
        output.print(`❌ Streaming chat completion failed: ${describeError(e)}`);
        return false;
    }
}
