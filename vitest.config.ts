import path from "node:path";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "book_collection")
    }
  },
  test: {
    include: ["book_collection/tests/**/*.test.ts"],
    environment: "node"
  }
});
