/**
 * Autogenerator registry
 *
 * Generators of frontend resources run once at startup, sequentially, in the
 * order they were registered. Registration closes when they run.
 */

import { ConfigurationError, createChildLogger } from '@kendb/shared';

const logger = createChildLogger({ component: 'Autogenerators' });

export interface Autogenerator {
  readonly name: string;
  run(): Promise<void>;
}

export class AutogeneratorRegistry {
  private generators: Autogenerator[] | null = [];

  register(generator: Autogenerator): void {
    if (this.generators === null) {
      throw new ConfigurationError('Autogenerator registration is no longer possible');
    }
    this.generators.push(generator);
  }

  get isOpen(): boolean {
    return this.generators !== null;
  }

  async run(): Promise<void> {
    const generators = this.generators;
    this.cancelRegistrations();
    if (generators === null) {
      throw new ConfigurationError('Autogenerators have already run');
    }

    for (const generator of generators) {
      const startTime = Date.now();
      await generator.run();
      logger.info({ generator: generator.name, duration: Date.now() - startTime }, 'Autogenerator finished');
    }
  }

  /**
   * Close registration without running anything
   */
  cancelRegistrations(): void {
    this.generators = null;
  }
}
