import type { AppConfig, VenueConfig } from '../config.js';
import { ConfigValidationError } from '../core/errors.js';
import { VenueRole } from '../core/types.js';
import type { Logger } from '../lib/logger.js';
import type { ExchangeAdapter } from './adapter.js';
import { createPaperVenue } from './paperVenue.js';
import { RetryingAdapter } from './retryingAdapter.js';

export interface VenueContext {
  logger: Logger;
}

export type VenueFactory = (config: VenueConfig, context: VenueContext) => ExchangeAdapter;

/**
 * Maps a venue id from configuration to the factory that builds its adapter.
 * Bindings register themselves explicitly at startup.
 */
export class VenueRegistry {
  private readonly factories = new Map<string, VenueFactory>();

  register(id: string, factory: VenueFactory): this {
    if (this.factories.has(id)) {
      throw new ConfigValidationError(`Venue ${id} registered twice`, [`venues: ${id}`]);
    }
    this.factories.set(id, factory);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  ids(): string[] {
    return [...this.factories.keys()].sort();
  }

  create(config: VenueConfig, context: VenueContext): ExchangeAdapter {
    const factory = this.factories.get(config.id);
    if (!factory) {
      throw new ConfigValidationError(`Unknown venue ${config.id}`, [
        `venues.${config.name}.id: expected one of ${this.ids().join(', ') || '<none>'}`
      ]);
    }
    return factory(config, context);
  }
}

/** Registry with the in-process bindings that need no credentials. */
export const createDefaultRegistry = (): VenueRegistry =>
  new VenueRegistry().register('paper', createPaperVenue);

export interface VenuePair {
  maker: ExchangeAdapter;
  hedge: ExchangeAdapter;
}

/**
 * Builds both legs, each wrapped in the retry policy. Dry runs always trade on
 * paper, whatever binding the configuration names.
 */
export const createVenuePair = (
  config: Pick<AppConfig, 'venues' | 'retry' | 'dryRun'>,
  registry: VenueRegistry,
  logger: Logger
): VenuePair => {
  const build = (role: VenueRole): ExchangeAdapter => {
    const configured = config.venues[role];
    const venue =
      config.dryRun && configured.id !== 'paper' ? { ...configured, id: 'paper' } : configured;
    if (venue !== configured) {
      logger.warn('Dry run, using paper venue', { role, configured: configured.id });
    }
    const venueLogger = logger.child({ venue: venue.name });
    return new RetryingAdapter(
      registry.create(venue, { logger: venueLogger }),
      config.retry,
      venueLogger
    );
  };

  return { maker: build('maker'), hedge: build('hedge') };
};
