import { InvalidArgumentError, type Command } from "commander";
import { loadConfig, type Config } from "../config.js";
import { errorMessage, exitCodeFor } from "../errors.js";
import { createOpenAIServices, type Services } from "../services/index.js";
import { collectAttribute, type Attributes } from "../utils/attributes.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface RuntimeOptions {
  env?: NodeJS.ProcessEnv;
  createServices?: (config: Config, logger: Logger) => Services;
}

interface GlobalOptions {
  verbose?: boolean;
}

/**
 * Shared state of one CLI invocation: global flags, configuration and services.
 * Configuration is loaded once, on the first command that needs the remote service.
 */
export class CommandContext {
  private services: Services | null = null;

  constructor(
    private readonly program: Command,
    private readonly options: RuntimeOptions = {}
  ) {}

  get verbose(): boolean {
    return this.program.opts<GlobalOptions>().verbose === true;
  }

  get logger(): Logger {
    return createLogger({ verbose: this.verbose });
  }

  getServices(): Services {
    if (!this.services) {
      const config = loadConfig(this.options.env);
      const create = this.options.createServices ?? createOpenAIServices;
      this.services = create(config, this.logger);
    }
    return this.services;
  }

  /**
   * Run a command body; failures are reported and mapped to the exit code.
   */
  async run(action: (services: Services) => Promise<void>): Promise<void> {
    try {
      await action(this.getServices());
    } catch (error) {
      this.fail(error);
    }
  }

  /**
   * Run a command body that needs no remote service or configuration.
   */
  async runLocal(action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.fail(error);
    }
  }

  fail(error: unknown): void {
    console.error(`❌ ${errorMessage(error)}`);
    if (this.verbose && error instanceof Error && error.stack) {
      console.error(`\n${error.stack}`);
    }
    process.exitCode = exitCodeFor(error);
  }
}

/**
 * Option parser for repeated `--attr key=value` flags
 */
export function parseAttributeOption(
  value: string,
  previous: Attributes
): Attributes {
  try {
    return collectAttribute(value, previous);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parsed;
}

export function parseScore(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError("Must be a number between 0 and 1.");
  }
  return parsed;
}

export function parseOrder(value: string): "asc" | "desc" {
  if (value === "asc" || value === "desc") {
    return value;
  }
  throw new InvalidArgumentError("Must be 'asc' or 'desc'.");
}
