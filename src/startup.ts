/**
 * Startup orchestrator
 *
 * Sequences configuration checks, model resolution, manifest validation
 * and captioner loading as an explicit, one-shot state machine.
 */

import { validateModelConfig } from './config.js';
import { Captioner, type CaptionerOptions } from './captioning/index.js';
import { CaptionModelRegistry } from './captioning/model.js';
import {
  ConfigurationError,
  ModelLoadError,
  ResolutionError,
  ValidationError,
  errorMessage,
  isStartupError,
  type StartupError,
} from './errors.js';
import {
  ModelSourceResolver,
  createRemoteStore,
  type RemoteModelStore,
} from './resolver/index.js';
import type { Logger, ModelSource, ModelSourceConfig, StartupState } from './types.js';

/**
 * Legal successors of each state. FAILED and READY are terminal.
 */
const TRANSITIONS: Record<StartupState, readonly StartupState[]> = {
  INITIALIZING: ['RESOLVING_MODEL', 'FAILED'],
  RESOLVING_MODEL: ['VALIDATING', 'FAILED'],
  VALIDATING: ['LOADING_CAPTIONER', 'FAILED'],
  LOADING_CAPTIONER: ['READY', 'FAILED'],
  READY: [],
  FAILED: [],
};

export interface StateTransition {
  from: StartupState;
  to: StartupState;
  at: Date;
}

/**
 * Read-only view the HTTP layer uses to find the captioner
 */
export interface ReadinessSource {
  getState(): StartupState;
  getCaptioner(): Captioner | null;
}

/**
 * Replaceable collaborators, mainly for tests
 */
export interface StartupDependencies {
  /** Remote store to use instead of the one derived from the URI */
  remoteStore?: RemoteModelStore | null;
  /** Captioner factory; defaults to Captioner.load */
  loadCaptioner?: (options: CaptionerOptions, logger: Logger) => Promise<Captioner>;
}

/**
 * Runs startup exactly once and records how far it got
 */
export class StartupOrchestrator implements ReadinessSource {
  private config: ModelSourceConfig;
  private logger: Logger;
  private deps: StartupDependencies;
  private state: StartupState = 'INITIALIZING';
  private history: StateTransition[] = [];
  private captioner: Captioner | null = null;
  private source: ModelSource | null = null;
  private failure: StartupError | null = null;
  private running: Promise<Captioner> | null = null;

  constructor(config: ModelSourceConfig, logger: Logger, deps: StartupDependencies = {}) {
    this.config = config;
    this.logger = logger;
    this.deps = deps;
  }

  /**
   * Start up. Later calls return the outcome of the first one.
   */
  run(): Promise<Captioner> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  getState(): StartupState {
    return this.state;
  }

  getCaptioner(): Captioner | null {
    return this.captioner;
  }

  getSource(): ModelSource | null {
    return this.source;
  }

  getFailure(): StartupError | null {
    return this.failure;
  }

  getHistory(): StateTransition[] {
    return [...this.history];
  }

  isReady(): boolean {
    return this.state === 'READY';
  }

  private async execute(): Promise<Captioner> {
    const started = Date.now();

    try {
      this.checkConfiguration();
      const resolver = new ModelSourceResolver(this.config, this.remoteStore(), this.logger);

      this.transition('RESOLVING_MODEL');
      await resolver.fetchRemote();

      this.transition('VALIDATING');
      const source = await resolver.validate();
      this.source = source;

      this.transition('LOADING_CAPTIONER');
      const load = this.deps.loadCaptioner ?? ((options, logger) => Captioner.load(options, logger));
      const captioner = await load(
        {
          family: this.config.modelFamily,
          source,
          decoding: this.config.decoding,
          device: this.config.device,
        },
        this.logger
      );
      this.captioner = captioner;

      this.transition('READY');
      this.logger.info('Startup complete', {
        source: source.kind,
        durationMs: Date.now() - started,
      });
      return captioner;
    } catch (error) {
      const failure = this.classify(error);
      this.failure = failure;
      this.logger.error(`Startup failed during ${this.state}`, {
        code: failure.code,
        error: failure.message,
      });
      this.transition('FAILED');
      throw failure;
    }
  }

  /**
   * INITIALIZING: configuration must be complete and the family known
   */
  private checkConfiguration(): void {
    const problems = validateModelConfig(this.config);
    if (this.config.modelFamily && !CaptionModelRegistry.has(this.config.modelFamily)) {
      problems.push(
        `Unknown MODEL_FAMILY: ${this.config.modelFamily} (available: ${CaptionModelRegistry.list().join(', ')})`
      );
    }
    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }
  }

  private remoteStore(): RemoteModelStore | null {
    if (this.deps.remoteStore !== undefined) {
      return this.deps.remoteStore;
    }
    if (!this.config.remoteUri) {
      return null;
    }
    return createRemoteStore(this.config.remoteUri, this.logger, this.config.downloadConcurrency);
  }

  private transition(to: StartupState): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal startup transition ${from} -> ${to}`);
    }
    this.state = to;
    this.history.push({ from, to, at: new Date() });
    this.logger.info(`Startup state: ${from} -> ${to}`);
  }

  /**
   * Type an error by the phase it escaped from
   */
  private classify(error: unknown): StartupError {
    if (isStartupError(error)) {
      return error;
    }
    const message = errorMessage(error);
    switch (this.state) {
      case 'INITIALIZING':
        return new ConfigurationError([message], { cause: error });
      case 'RESOLVING_MODEL':
        return new ResolutionError(message, { cause: error });
      case 'VALIDATING':
        return new ValidationError(message, { cause: error });
      default:
        return new ModelLoadError(message, { cause: error });
    }
  }
}
