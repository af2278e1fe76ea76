import { EventEmitter } from 'eventemitter3';
import {
  Alert,
  DecisionEvent,
  FeeEvent,
  MetricsSnapshot,
  TransitionEvent
} from '../core/types.js';

export type EventBusEvents = {
  decision: (event: DecisionEvent) => void;
  transition: (event: TransitionEvent) => void;
  fee: (event: FeeEvent) => void;
  alert: (alert: Alert) => void;
  metrics: (snapshot: MetricsSnapshot) => void;
};

export class EventBus extends EventEmitter<EventBusEvents> {}

export const eventBus = new EventBus();
