import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "registry",
    include: ["tests/**/*.test.ts"],
  },
});
