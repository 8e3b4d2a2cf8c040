import { defineConfig } from "vite";
import basicSsl from "@vitejs/plugin-basic-ssl";
import { VitePWA } from "vite-plugin-pwa";

export default defineConfig({
  root: "src/app",
  server: {
    host: "0.0.0.0",
  },
  build: {
    outDir: "../../dist/app",
    emptyOutDir: true,
  },
  plugins: [
    // Service workers need a secure context when testing on a phone over the LAN
    basicSsl(),
    VitePWA({
      registerType: "autoUpdate",
      manifest: {
        name: "Moraine Offset",
        short_name: "Moraine Offset",
        description: "Horizontal moraine offset from dip slip on an oblique fault",
        theme_color: "#5b7553",
        background_color: "#f5f1e6",
        display: "standalone",
        icons: [
          {
            src: "icon.svg",
            sizes: "any",
            type: "image/svg+xml",
            purpose: "any",
          },
        ],
      },
      workbox: {
        globPatterns: ["**/*.{js,css,html,svg}"],
      },
    }),
  ],
});
