/**
 * Build pipeline.
 *
 * The Builder owns a catalogue of step classes and one {@link BuildContext}.
 * Every `build()` call runs a full pass over the catalogue:
 *
 * 1. **Init pass**: each step is constructed, initialized with the resolved
 *    options and asked whether it applies. Nothing is processed yet, so the
 *    number of steps to run is known before the first one starts.
 * 2. **Process pass**: the applicable steps run one after the other, in
 *    catalogue order, each awaited before the next starts.
 *
 * A failing step stops the pass. Earlier changes to the context are kept as
 * they are; the error names the step and carries the cause.
 *
 * ## Usage
 *
 * ```typescript
 * const config = await loadConfig({ sourceDir: "./site" });
 * const builder = Builder.create({ config });
 * await builder.build({ drafts: true });
 * ```
 *
 * @module
 */

import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { Config } from "../config/Config.js";
import { createLogger, type ContextualLogger } from "../logging/ContextualLogger.js";
import { createExecutionContext } from "../logging/ExecutionContext.js";
import { BuildTrace, SYSTEM_CLOCK, type TraceClock } from "../observability/BuildTrace.js";
import { formatBytes, round2 } from "../utils/format.js";
import { getVersion } from "../version/VersionResolver.js";
import { createDefaultGeneratorRegistry } from "../generate/defaults.js";
import type { GeneratorRegistry } from "../generate/Generator.js";
import { DEFAULT_STEPS } from "../steps/index.js";
import { BuildContext, DEBUG_ENV_VAR } from "./BuildContext.js";
import {
  DEFAULT_BUILD_OPTIONS,
  resolveBuildOptions,
  type BuildOptions,
  type BuildOverrides,
} from "./BuildOptions.js";
import type { Step, StepConstructor } from "./Step.js";

// =============================================================================
// Types
// =============================================================================

export interface BuilderOptions {
  /** Site configuration (default: all defaults, current directory) */
  config?: Config;

  /** Logger (default: JSON lines on stdout) */
  logger?: ContextualLogger;

  /** Step catalogue, in execution order (default: {@link DEFAULT_STEPS}) */
  steps?: readonly StepConstructor[];

  /** Generator registry (default: every built-in generator) */
  generators?: GeneratorRegistry;

  /** Environment used for QUIRE_DEBUG (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Time and heap source (default: performance.now and process.memoryUsage) */
  clock?: TraceClock;
}

/**
 * Matches a base URL made only of whitespace and slashes (or empty).
 */
const EMPTY_BASEURL = /^[\s/]*$/;

// =============================================================================
// Builder
// =============================================================================

export class Builder {
  readonly context: BuildContext;

  private readonly steps: readonly StepConstructor[];
  private readonly logger: ContextualLogger;
  private readonly clock: TraceClock;

  private buildOptions: BuildOptions = DEFAULT_BUILD_OPTIONS;
  private lastTrace: BuildTrace | null = null;
  private runLogger: ContextualLogger | null = null;
  private buildCount = 0;
  private building = false;

  constructor(options: BuilderOptions = {}) {
    const config = options.config ?? new Config();
    const env = options.env ?? process.env;
    const debug = env[DEBUG_ENV_VAR] === "true" || config.isDebug;

    this.logger = options.logger ?? createLogger({ minLevel: debug ? "debug" : "info", debug });
    this.steps = options.steps ?? DEFAULT_STEPS;
    this.clock = options.clock ?? SYSTEM_CLOCK;
    this.context = new BuildContext({
      config,
      logger: this.logger,
      generators: options.generators ?? createDefaultGeneratorRegistry(),
      env,
    });
  }

  static create(options: BuilderOptions = {}): Builder {
    return new Builder(options);
  }

  /**
   * Version of the running engine.
   */
  static getVersion(): string {
    return getVersion();
  }

  // ===========================================================================
  // Build
  // ===========================================================================

  /**
   * Runs one full pipeline pass.
   *
   * @throws BuildError BUILD_IN_PROGRESS if a build of this Builder is running
   * @throws BuildError STEP_INIT_FAILED if a step fails to construct or init
   * @throws BuildError STEP_FAILED if a step's `process()` fails
   */
  async build(overrides: BuildOverrides = {}): Promise<this> {
    if (this.building) {
      throw new BuildError(
        "A build is already running",
        ErrorCode.BUILD_IN_PROGRESS,
        undefined,
        "Wait for the previous build() to settle before starting another one."
      );
    }

    this.building = true;
    try {
      await this.run(overrides);
    } finally {
      this.building = false;
      this.runLogger = null;
    }
    return this;
  }

  private async run(overrides: BuildOverrides): Promise<void> {
    const startMark = this.clock.now();
    const startHeap = this.clock.heapUsed();

    this.buildCount += 1;
    const execution = createExecutionContext({ buildNumber: this.buildCount });
    const logger = this.logger.withContext({ correlationId: execution.correlationId });
    this.runLogger = logger;

    this.context.lockConfig();
    this.checkBaseurl(logger);

    const options = resolveBuildOptions(overrides);
    this.buildOptions = options;

    const steps = this.initSteps(options, logger);
    const trace = new BuildTrace(this.clock);
    this.lastTrace = trace;

    const stepTotal = steps.length;
    let stepIndex = 0;
    for (const step of steps) {
      stepIndex += 1;
      const name = step.getName();
      logger.notice(name, { step: name, stepIndex, stepTotal });
      trace.start(name);

      try {
        await step.process();
      } catch (error) {
        trace.fail(name);
        const cause = toError(error);
        logger.debug("Step failed", { step: name, stepIndex, stepTotal, error: cause });
        throw new BuildError(
          `Step "${name}" failed: ${cause.message}`,
          ErrorCode.STEP_FAILED,
          {
            step: name,
            stepIndex,
            stepTotal,
            causeCode: cause instanceof BuildError ? cause.code : undefined,
          },
          cause instanceof BuildError ? cause.hint : undefined,
          cause
        );
      }

      trace.end(name);
    }

    const durationMs = this.clock.now() - startMark;
    const memoryDelta = this.clock.heapUsed() - startHeap;
    logger.notice(`Built in ${round2(durationMs / 1000)} s (${formatBytes(memoryDelta)})`, {
      event: "build.end",
      durationMs,
      memoryDelta,
    });
  }

  /**
   * Constructs and initializes the whole catalogue; returns the steps that
   * apply, in catalogue order.
   */
  private initSteps(options: BuildOptions, logger: ContextualLogger): Step[] {
    const applicable: Step[] = [];

    for (const StepClass of this.steps) {
      let step: Step | undefined;
      try {
        step = new StepClass(this);
        step.init(options);
        if (step.canProcess()) {
          applicable.push(step);
        } else {
          logger.debug("Step skipped", { step: step.getName() });
        }
      } catch (error) {
        const cause = toError(error);
        const name = stepLabel(StepClass, step);
        throw new BuildError(
          `Step "${name}" failed to initialize: ${cause.message}`,
          ErrorCode.STEP_INIT_FAILED,
          { step: name, causeCode: cause instanceof BuildError ? cause.code : undefined },
          undefined,
          cause
        );
      }
    }

    return applicable;
  }

  private checkBaseurl(logger: ContextualLogger): void {
    const baseurl = this.context.getConfig().baseurl;
    if (EMPTY_BASEURL.test(baseurl)) {
      logger.error(
        `The current \`baseurl\` ("${baseurl}") is not valid for production ` +
          `(should be something like "baseurl: https://example.com/").`
      );
    }
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  /**
   * Options of the current or last build (defaults before the first one).
   */
  getBuildOptions(): BuildOptions {
    return this.buildOptions;
  }

  /**
   * Per-step timings of the current or last build.
   */
  getLastTrace(): BuildTrace | null {
    return this.lastTrace;
  }

  /**
   * Logger of the running build (bound to its correlation id), or the base
   * logger outside a build.
   */
  getLogger(): ContextualLogger {
    return this.runLogger ?? this.logger;
  }

  getSteps(): readonly StepConstructor[] {
    return this.steps;
  }

  getConfig(): Config {
    return this.context.getConfig();
  }

  /**
   * @throws BuildError CONFIG_LOCKED after the first build
   */
  setConfig(config: Config): this {
    this.context.setConfig(config);
    return this;
  }

  /**
   * Sets the source directory; `null` resets it to the working directory.
   */
  setSourceDir(dir: string | null): this {
    this.context.getConfig().setSourceDir(dir);
    return this;
  }

  /**
   * Sets the destination directory; `null` resets it to `<source>/<output.dir>`.
   */
  setDestinationDir(dir: string | null): this {
    this.context.getConfig().setDestinationDir(dir);
    return this;
  }
}

/**
 * Name of a step for error reports, even when its construction failed.
 */
function stepLabel(StepClass: StepConstructor, step: Step | undefined): string {
  if (step !== undefined) {
    try {
      return step.getName();
    } catch {
      return StepClass.name;
    }
  }
  return StepClass.name;
}

export { getVersion };
