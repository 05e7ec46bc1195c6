import base from "../eslint.base.config";
import globals from "globals";

export default [
  ...base,
  {
    ignores: ["vitest.config.ts", "eslint.config.ts"],
  },
  {
    files: ["**/*.ts"],
    languageOptions: {
      parserOptions: {
        tsconfigRootDir: import.meta.dirname,
      },
      globals: {
        ...globals.node,
      },
    },
  }
];
