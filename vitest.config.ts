import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["integration/**/*.test.ts"],
        environment: "node",
        testTimeout: 10_000,
    },
});
