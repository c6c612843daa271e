/**
 * Events Module
 */

export { EventBus } from './event-bus.js';
export {
  DEFAULT_EVENT_BUS_CONFIG,
  EventTypes,
  type BusEvent,
  type EventInput,
  type EventCallback,
  type EventPriority,
  type EventBusConfig,
  type EventBusStats,
} from './types.js';
