import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts", "tests/**/*.{test,spec}.tsx"],
    env: {
      MODALCHAT_FAKE_CLIPBOARD: "1",
    },
    pool: "threads",
  },
})
