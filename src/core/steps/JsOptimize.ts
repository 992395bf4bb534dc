import { minify as terserMinify } from "terser";
import { StaticOptimize } from "./StaticOptimize.js";

/**
 * Minifies the copied `.js` files with terser.
 */
export class JsOptimize extends StaticOptimize {
  protected readonly extension = ".js";
  protected readonly label = "JS";

  getName(): string {
    return "Optimizing JS";
  }

  protected isTypeEnabled(): boolean {
    return this.config.optimize.js;
  }

  protected async minify(source: string, outputPath: string): Promise<string> {
    const result = await terserMinify({ [outputPath]: source }, { compress: true, mangle: true });
    if (result.code === undefined) {
      throw new Error("terser returned no code");
    }
    return result.code;
  }
}
