import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { defineConfig } from "vitest/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
    setupFiles: [resolve(__dirname, "packages/shared/test/setup.ts")],
    env: {
      DOTENV_CONFIG_PATH: resolve(__dirname, "./.env.test"),
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "./coverage",
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/*.d.ts",
        "**/test/**",
        "**/*.test.ts",
        "apps/worker/src/cli.ts",
      ],
    },
  },
});
