import {defineConfig} from "vitest/config";

export default defineConfig({
    test: {
        include: ["test/**/*.test.ts"],
        // tsyringe は読み込み時に Reflect のポリフィルを要求する
        setupFiles: ["./test/setup.ts"],
    },
});
