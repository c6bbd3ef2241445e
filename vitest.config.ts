// vitest.config.ts
//
// Tests unitaires (lib/ + routes API) en environnement Node, sans réseau.
// L’alias `@/` reprend celui de tsconfig.json.

import { defineConfig } from "vitest/config";
import { fileURLToPath, URL } from "node:url";

const root = fileURLToPath(new URL("./", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [{ find: /^@\//, replacement: root }],
  },
  test: {
    environment: "node",
    include: ["**/*.test.ts"],
    exclude: ["node_modules/**", ".next/**", "dist/**"],
  },
});
