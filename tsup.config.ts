/*
 *   Copyright (c) 2023 Garmingo
 *   All rights reserved.
 *   Unauthorized use, reproduction, and distribution of this source code is strictly prohibited.
 */
import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/bin.ts"],
  format: ["cjs", "esm"], // Build for commonJS and ESmodules
  dts: { entry: "src/index.ts" }, // Generate declaration file (.d.ts)
  splitting: false,
  sourcemap: true,
  clean: true,
});
