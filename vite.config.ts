import { defineConfig, type Plugin } from "vite";
import dts from "vite-plugin-dts";
import fs from "fs";
import path from "path";

/**
 * Rewrite __DEV__ to a process.env check so invariant checks stay
 * available to consumers and their bundlers can still drop them.
 */
function replaceDevGlobals(): Plugin {
  return {
    name: "replace-dev-globals",
    transform(code, id) {
      if (id.includes("node_modules")) return null;
      const result = code.replace(
        /\b__DEV__\b/g,
        'process.env.NODE_ENV !== "production"',
      );
      return result !== code ? result : null;
    },
  };
}

// src/<dir> is importable as "<dir>", e.g. "type_primitives"
const src_aliases = Object.fromEntries(
  fs
    .readdirSync(path.resolve(__dirname, "src"), { withFileTypes: true })
    .filter((dirent) => dirent.isDirectory() && !dirent.name.startsWith("__"))
    .map((dirent) => [dirent.name, path.resolve(__dirname, `./src/${dirent.name}`)]),
);

export default defineConfig(({ command }) => ({
  plugins: [
    ...(command === "build"
      ? [
          replaceDevGlobals(),
          dts({ tsconfigPath: "./tsconfig.build.json", rollupTypes: false }),
        ]
      : []),
  ],

  define: command === "build" ? {} : { __DEV__: "true" },

  resolve: { alias: src_aliases },

  build: {
    target: "es2022",
    lib: {
      entry: path.resolve(__dirname, "src/index.ts"),
      formats: ["es", "cjs"],
      fileName: (format) => (format === "es" ? "index.js" : "index.cjs"),
    },
    rollupOptions: {
      external: ["pino"],
    },
  },
}));
