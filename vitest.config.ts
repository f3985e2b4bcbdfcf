import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@treesmith/core": packageSource("core"),
      "@treesmith/store-git": packageSource("store-git"),
      "@treesmith/store-mem": packageSource("store-mem"),
      "@treesmith/testing": packageSource("testing"),
      "@treesmith/utils": packageSource("utils"),
    },
  },
});
