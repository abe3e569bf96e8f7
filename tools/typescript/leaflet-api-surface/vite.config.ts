import { defineConfig } from "vitest/config";
import dts from "vite-plugin-dts";

export default defineConfig({
  build: {
    lib: {
      entry: "src/index.ts",
      name: "LeafletApiSurface",
      fileName: "leaflet-api-surface",
      formats: ["es", "umd"],
    },
    rollupOptions: {
      // Leaflet is a peer dependency; keep it out of the bundle
      external: ["leaflet"],
      output: {
        globals: {
          leaflet: "L",
        },
      },
    },
  },
  plugins: [dts({ rollupTypes: true })],
  test: {
    environment: "jsdom",
    include: ["tests/**/*.test.ts"],
  },
});
