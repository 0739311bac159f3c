import { defineConfig } from "vite";
import { resolve } from "path";
import dts from "vite-plugin-dts";

export default defineConfig({
  plugins: [dts({ include: ["src/**/*"], outDir: "dist" })],  // TypeScript 선언 파일 생성
  build: {
    lib: {
      entry: resolve(__dirname, "src/index.ts"),
      name: "KeymarkCore",
      formats: ["es", "cjs"],
      fileName: (format) => `index.${format === "es" ? "js" : "cjs"}`,
    },
    rollupOptions: {
      // 파일 입출력은 Node 내장 모듈 사용
      external: [/^node:/],
    },
    sourcemap: true,
    minify: false,
  },
});
