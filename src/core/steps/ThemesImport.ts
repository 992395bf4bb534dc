import { BuildError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { AbstractStep } from "../build/Step.js";
import { isDirectory } from "../utils/paths.js";

/**
 * Resolves the configured themes to directories under `themes.dir`; no
 * theme directories when none is configured.
 */
export class ThemesImport extends AbstractStep {
  getName(): string {
    return "Importing themes";
  }

  async process(): Promise<void> {
    const dirs: string[] = [];

    for (const theme of this.config.themes) {
      const dir = this.config.themePath(theme);
      if (!(await isDirectory(dir))) {
        throw new BuildError(
          `Theme "${theme}" not found`,
          ErrorCode.THEME_NOT_FOUND,
          { theme, path: dir },
          `Create ${dir} or remove "${theme}" from \`theme\` in the configuration.`
        );
      }
      dirs.push(dir);
      this.logger.debug("Theme imported", { theme, path: dir });
    }

    this.context.setThemeDirs(dirs);
  }
}
