import { defineConfig } from 'vite';

export default defineConfig({
  // Relative paths so the built demo works from any static host path
  base: './',

  build: {
    // tsc owns dist/; the demo bundle goes beside it
    outDir: 'dist-web',
    sourcemap: true,
  },

  // Development server config
  server: {
    port: 5173,
    open: false,
  },
});
