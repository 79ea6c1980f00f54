import { defineConfig } from "vitest/config";

// One config at the root so `npm test` covers every workspace.
export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"]
  }
});
