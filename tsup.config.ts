import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The compiler and reader touch only DataView, TextEncoder and TextDecoder,
  // which browsers and Node.js share.
  platform: "neutral",
});
