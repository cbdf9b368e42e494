import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["ts/*/src/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
  },
})
