import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // forks rather than threads: some tests change the working directory
    pool: "forks",
    restoreMocks: true,
  },
})
