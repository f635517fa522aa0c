import { defineConfig } from "vitest/config";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = dirname(fileURLToPath(import.meta.url));
const packageEntry = (name: string) =>
  resolve(rootDir, "packages", name, "src/index.ts");

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@spatialnb/window-schema": packageEntry("window-schema"),
      "@spatialnb/config": packageEntry("config"),
      "@spatialnb/workspace": packageEntry("workspace"),
      "@spatialnb/remote-session": packageEntry("remote-session"),
    },
  },
});
