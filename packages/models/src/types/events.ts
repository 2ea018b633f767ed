import type { ConfigurationEventType } from '../enums/events.js';

/**
 * Payload emitted for every structural change of a configuration.
 */
export interface ConfigurationChangeEvent {
  type: ConfigurationEventType;
  /** Affected key; undefined for operations on the whole configuration */
  key?: string;
  /** The value passed to the operation, if any */
  value?: unknown;
  timestamp: string;
}

/**
 * Event map of a configuration, keyed by event type.
 */
export type ConfigurationEvents = {
  [K in ConfigurationEventType]: ConfigurationChangeEvent;
};
