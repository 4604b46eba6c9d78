// @ts-check
import eslint from "@eslint/js"
import * as effectEslint from "@effect/eslint-plugin"
import { defineConfig } from "eslint/config"
import sortDestructureKeys from "eslint-plugin-sort-destructure-keys"
import globals from "globals"
import tseslint from "typescript-eslint"

export default defineConfig(
  eslint.configs.recommended,
  tseslint.configs.strictTypeChecked,
  effectEslint.configs.dprint,
  {
    name: "analyzers",
    files: ["**/*.ts"],
    languageOptions: {
      parser: tseslint.parser,
      globals: { ...globals.node },
      parserOptions: {
        projectService: true,
        tsconfigRootDir: import.meta.dirname
      }
    },
    plugins: {
      "sort-destructure-keys": sortDestructureKeys
    },
    rules: {
      "no-restricted-imports": ["error", {
        paths: [
          { name: "ts-pattern", message: "Use Effect.Match instead of ts-pattern." },
          { name: "zod", message: "Use @effect/schema for schemas and validation." }
        ]
      }],
      "no-restricted-syntax": [
        "error",
        {
          selector: "TryStatement",
          message: "Use Effect.try / catchAll instead of try/catch."
        },
        {
          selector: "SwitchStatement",
          message: "Use Effect.Match instead of switch."
        },
        {
          selector:
            "FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
          message: "Use Effect.gen / Effect.tryPromise instead of async/await."
        }
      ],
      "sort-destructure-keys/sort-destructure-keys": "error",
      "object-shorthand": "error",
      complexity: ["error", 8],
      "max-params": ["error", 5],
      "max-lines": ["error", { max: 300, skipBlankLines: true, skipComments: true }],
      "@typescript-eslint/array-type": ["warn", { default: "generic", readonly: "generic" }],
      "@typescript-eslint/consistent-type-imports": "warn",
      "@typescript-eslint/restrict-template-expressions": ["error", {
        allowNumber: true,
        allowBoolean: true,
        allowNullish: false,
        allowAny: false,
        allowRegExp: false
      }],
      "@typescript-eslint/no-unused-vars": ["error", {
        argsIgnorePattern: "^_",
        varsIgnorePattern: "^_"
      }],
      "@effect/dprint": ["error", {
        config: {
          indentWidth: 2,
          lineWidth: 120,
          semiColons: "asi",
          quoteStyle: "alwaysDouble",
          trailingCommas: "never",
          operatorPosition: "maintain",
          "arrowFunction.useParentheses": "force"
        }
      }]
    }
  },
  {
    files: ["tests/**"],
    rules: {
      "max-lines-per-function": "off"
    }
  },
  { ignores: ["dist/**", "eslint.config.mts", "vitest.config.ts"] }
)
