import { defineConfig } from "vitest/config";
import swc from "unplugin-swc";

// esbuild does not emit decorator metadata; swc provides design:paramtypes.
export default defineConfig({
  plugins: [
    swc.vite({
      jsc: {
        parser: { syntax: "typescript", decorators: true },
        transform: { legacyDecorator: true, decoratorMetadata: true },
      },
    }),
  ],
  test: {
    environment: "node",
  },
});
