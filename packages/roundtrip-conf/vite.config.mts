/// <reference types="vitest" />
import path from "node:path"
import { fileURLToPath } from "node:url"
import { defineConfig } from "vite"
import dts from "vite-plugin-dts"

const dirname = path.dirname(fileURLToPath(import.meta.url))
const resolvePath = (str: string) => path.resolve(dirname, str)

export default defineConfig({
  build: {
    target: "node20",
    lib: {
      entry: resolvePath("./src/index.ts"),
      name: "roundtrip-conf",
    },
    sourcemap: "inline",
    minify: false,

    rollupOptions: {
      external: ["immer", "fast-deep-equal", /^node:/],

      output: [
        {
          format: "esm",
          entryFileNames: "roundtrip-conf.esm.mjs",
        },
      ],
    },
  },
  plugins: [
    dts({
      tsconfigPath: resolvePath("../../tsconfig.json"),
      outDir: resolvePath("./dist/types"),
    }),
  ],
  test: {
    include: ["test/**/*.test.ts"],
  },
})
