import type { IndexItem, RebuildConfig } from './types';

export type RebuildState = 'idle' | 'running';

export type RebuildCoordinatorOptions = {
  build(config: RebuildConfig): Promise<readonly IndexItem[]>;
  publish(items: readonly IndexItem[]): void;
};

/**
 * Runs index rebuilds one at a time. Triggers that arrive while a rebuild runs collapse into a
 * single follow-up rebuild, which starts with the config of the latest trigger.
 */
export class RebuildCoordinator {
  private readonly options: RebuildCoordinatorOptions;

  private running: Promise<void> | null = null;

  private queued: Promise<void> | null = null;

  private nextConfig: RebuildConfig | null = null;

  private disposed = false;

  constructor(options: RebuildCoordinatorOptions) {
    this.options = options;
  }

  get state(): RebuildState {
    return this.running ? 'running' : 'idle';
  }

  /**
   * Schedules a rebuild and returns without waiting for it. The returned promise settles with
   * the rebuild this trigger ended up in; it rejects when that rebuild fails.
   */
  trigger(config: RebuildConfig): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new Error('Rebuild coordinator has been disposed'));
    }

    this.nextConfig = config;
    if (this.queued) {
      return this.queued;
    }

    const previous = this.running;
    if (!previous) {
      return this.start();
    }

    // A failed rebuild was already reported to its own triggers; the follow-up runs regardless.
    this.queued = previous.then(
      () => this.startQueued(),
      () => this.startQueued(),
    );
    return this.queued;
  }

  /** Waits until no rebuild is running or queued. Rebuild failures are not rethrown. */
  async whenIdle(): Promise<void> {
    while (this.running || this.queued) {
      await Promise.allSettled([this.running, this.queued]);
    }
  }

  /** Drops a queued follow-up and waits for the in-flight rebuild. */
  async dispose(): Promise<void> {
    this.disposed = true;
    this.nextConfig = null;
    await this.whenIdle();
  }

  private startQueued(): Promise<void> {
    this.queued = null;
    if (this.disposed) {
      return Promise.resolve();
    }
    return this.start();
  }

  private start(): Promise<void> {
    const config = this.nextConfig;
    this.nextConfig = null;
    if (!config) {
      return Promise.resolve();
    }

    const job = this.run(config).finally(() => {
      if (this.running === job) {
        this.running = null;
      }
    });
    this.running = job;
    return job;
  }

  private async run(config: RebuildConfig): Promise<void> {
    const items = await this.options.build(config);
    this.options.publish(items);
  }
}
