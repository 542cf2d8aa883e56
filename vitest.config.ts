import { transformWithEsbuild } from "vite"
import { defineConfig } from "vitest/config"

export default defineConfig({
  // Vite's built-in esbuild transform forces `keepNames: false`, which renames
  // `const read = cached(..., function read() {})` to `read2` and changes `fn.name`.
  esbuild: false,
  plugins: [
    {
      name: "ts-keep-names",
      async transform(code, id) {
        if (!/\.ts$/.test(id.split("?")[0] ?? "")) return null
        const result = await transformWithEsbuild(code, id, {
          loader: "ts",
          target: "esnext",
          keepNames: true,
        })
        return { code: result.code, map: JSON.stringify(result.map) }
      },
    },
  ],
  test: {
    environment: "node",
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    mockReset: true,
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
    coverage: {
      enabled: true,
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "**/*tests*/**",
        "**/*.test.*",
        "**/*.contract.ts",
        "**/dist/**",
        "**/node_modules/**",
      ],
    },
  },
})
