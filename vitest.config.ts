import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.spec.ts"],
    environment: "node",
    // OpenPGP key generation runs inside a few specs
    testTimeout: 30_000,
  },
});
