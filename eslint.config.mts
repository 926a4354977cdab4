// eslint.config.mts
import eslint from "@eslint/js";
import eslintCommentsConfigs from "@eslint-community/eslint-plugin-eslint-comments/configs";
import { defineConfig } from "eslint/config";
import vitest from "eslint-plugin-vitest";
import globals from "globals";
import tseslint from "typescript-eslint";

export default defineConfig(
	eslint.configs.recommended,
	tseslint.configs.strictTypeChecked,
	eslintCommentsConfigs.recommended,
	{
		languageOptions: {
			parser: tseslint.parser,
			globals: { ...globals.node },
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		files: ["**/*.ts"],
		rules: {
			complexity: ["error", 8],
			"max-lines-per-function": [
				"error",
				{ max: 50, skipBlankLines: true, skipComments: true },
			],
			"max-params": ["error", 5],
			"max-depth": ["error", 4],
			"max-lines": [
				"error",
				{ max: 300, skipBlankLines: true, skipComments: true },
			],
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{ allowNumber: true, allowBoolean: false, allowNullish: false },
			],
			"@typescript-eslint/ban-ts-comment": [
				"error",
				{
					"ts-ignore": true,
					"ts-nocheck": true,
					"ts-expect-error": true,
					"ts-check": true,
				},
			],
			"@eslint-community/eslint-comments/no-unlimited-disable": "error",
			"@eslint-community/eslint-comments/disable-enable-pair": "error",
			"@eslint-community/eslint-comments/no-unused-disable": "error",
			"no-restricted-syntax": [
				"error",
				{
					selector: "SwitchStatement",
					message:
						"Use ts-pattern match(...).with(...).exhaustive() instead of switch.",
				},
				{
					selector:
						"FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
					message: "No async/await: use Effect.gen / Effect.tryPromise.",
				},
				{
					selector: "NewExpression[callee.name='Promise']",
					message: "No new Promise: use Effect.async / Effect.tryPromise.",
				},
			],
		},
	},

	// CORE stays pure: no console, no process, no imports from SHELL/APP
	{
		files: ["src/core/**/*.ts"],
		rules: {
			"no-console": "error",
			"no-restricted-globals": ["error", "process"],
			"no-restricted-imports": [
				"error",
				{
					patterns: [
						{
							group: ["**/shell/**", "**/app/**", "node:*"],
							message: "CORE must not depend on SHELL, APP or Node built-ins.",
						},
					],
				},
			],
		},
	},

	// APP writes only through the injected OutputSink
	{
		files: ["src/app/**/*.ts"],
		rules: { "no-console": "error" },
	},

	{
		files: ["test/**/*.ts"],
		...vitest.configs.all,
		rules: {
			...vitest.configs.all.rules,
			"max-lines-per-function": "off",
			"vitest/prefer-expect-assertions": "off",
			"vitest/no-hooks": "off",
		},
	},

	{ ignores: ["dist/**", "coverage/**"] },
);
