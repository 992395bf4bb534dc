import CleanCSS from "clean-css";
import { StaticOptimize } from "./StaticOptimize.js";

const cleanCss = new CleanCSS({ level: 1 });

/**
 * Minifies the copied `.css` files with clean-css.
 */
export class CssOptimize extends StaticOptimize {
  protected readonly extension = ".css";
  protected readonly label = "CSS";

  getName(): string {
    return "Optimizing CSS";
  }

  protected isTypeEnabled(): boolean {
    return this.config.optimize.css;
  }

  protected async minify(source: string): Promise<string> {
    const output = cleanCss.minify(source);
    if (output.errors.length > 0) {
      throw new Error(output.errors.join("; "));
    }
    return output.styles;
  }
}
