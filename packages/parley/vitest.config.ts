import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: {
            "@/types": fileURLToPath(new URL("./sources/types.ts", import.meta.url))
        }
    },
    test: {
        include: ["sources/**/*.spec.ts"],
        testTimeout: 30_000,
        hookTimeout: 30_000
    }
});
