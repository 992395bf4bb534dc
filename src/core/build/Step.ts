/**
 * Step contract.
 *
 * A step is one stage of the build pipeline. The Builder constructs every
 * step of its catalogue at the start of each build, in catalogue order:
 *
 * 1. `init(options)`: record what the step needs from the options
 * 2. `canProcess()`: decide whether the step takes part in this build
 * 3. `process()`: do the work; the only place the build context changes
 *
 * All steps are initialized before the first one is processed, so
 * `canProcess()` must depend on configuration, options and the filesystem
 * only, never on what another step will produce in the same build.
 *
 * @module
 */

import type { Builder } from "./Builder.js";
import type { BuildContext } from "./BuildContext.js";
import { DEFAULT_BUILD_OPTIONS, type BuildOptions } from "./BuildOptions.js";
import type { Config } from "../config/Config.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";

// =============================================================================
// Types
// =============================================================================

export interface Step {
  /** Progress label, e.g. "Loading pages" */
  getName(): string;

  /** Records init-time state. Must not touch the build context. */
  init(options: BuildOptions): void;

  /** Whether this step runs in the current build */
  canProcess(): boolean;

  process(): Promise<void>;
}

/**
 * Catalogue entry: a step class bound to its Builder on construction.
 */
export type StepConstructor = new (builder: Builder) => Step;

// =============================================================================
// AbstractStep
// =============================================================================

/**
 * Base class of the built-in steps.
 *
 * @example
 * ```typescript
 * class CountPages extends AbstractStep {
 *   getName() { return "Counting pages"; }
 *
 *   async process() {
 *     this.logger.info("Pages", { count: this.context.getPages().size });
 *   }
 * }
 * ```
 */
export abstract class AbstractStep implements Step {
  protected options: BuildOptions = DEFAULT_BUILD_OPTIONS;

  constructor(protected readonly builder: Builder) {}

  abstract getName(): string;

  abstract process(): Promise<void>;

  init(options: BuildOptions): void {
    this.options = options;
  }

  canProcess(): boolean {
    return true;
  }

  protected get context(): BuildContext {
    return this.builder.context;
  }

  protected get config(): Config {
    return this.builder.context.getConfig();
  }

  /**
   * Logger bound to this step's name.
   */
  protected get logger(): ContextualLogger {
    return this.builder.getLogger().withContext({ step: this.getName() });
  }

  protected get isDryRun(): boolean {
    return this.options["dry-run"];
  }
}
