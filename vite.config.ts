/// <reference types="vitest" />
import { defineConfig } from "vite";
import { configDefaults } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        include: ["src/**/*.spec.ts", "test/**/*.spec.ts"],
        exclude: [...configDefaults.exclude, "dist/"],
        coverage: {
            provider: "v8",
            include: ["src/**"],
        },
    },
});
