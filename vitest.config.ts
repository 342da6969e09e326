import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["libs/**/*.test.ts", "services/**/*.test.ts"],
  },
});
