import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@lumen/core": pkg("core"),
      "@lumen/texture": pkg("texture"),
      "@lumen/graph": pkg("graph"),
      "@lumen/stages": pkg("stages"),
      "@lumen/effect-runtime": pkg("effect-runtime"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
});
