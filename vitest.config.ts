import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env file for tests
  const env = loadEnv(mode, process.cwd(), "");

  return {
    test: {
      globals: true,
      environment: "node",
      include: ["tests/**/*.test.ts"],
      env: {
        ...env,
        LOG_LEVEL: "silent",
        VCON_SIGNING_SECRET: "test-secret",
        // base64url of "test-encryption-key-0123456789ab" (32 bytes, A256GCM)
        VCON_ENCRYPTION_KEY: "dGVzdC1lbmNyeXB0aW9uLWtleS0wMTIzNDU2Nzg5YWI",
        VCON_VERSION: "0.0.1",
      },
      coverage: {
        provider: "v8",
        reporter: ["text", "json", "html"],
        include: ["src/**/*.ts"],
        exclude: ["src/index.ts", "src/cli.ts"],
      },
      testTimeout: 10000,
      hookTimeout: 10000,
    },
  };
});
