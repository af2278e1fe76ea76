import { errorMessage } from '../core/errors.js';
import { Alert } from '../core/types.js';
import { EventBus } from '../lib/eventBus.js';
import type { Logger } from '../lib/logger.js';

/** Alert delivery. Chat and webhook bindings live outside this repository. */
export interface Notifier {
  notify(alert: Alert): Promise<void>;
}

export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async notify(alert: Alert): Promise<void> {
    const meta = {
      title: alert.title,
      instrument: alert.instrument,
      ...alert.metadata
    };
    switch (alert.severity) {
      case 'critical':
        this.logger.error(alert.message, meta);
        break;
      case 'warning':
        this.logger.warn(alert.message, meta);
        break;
      default:
        this.logger.info(alert.message, meta);
    }
  }
}

/** Publishes an alert on the bus and hands it to the notifier; delivery failures are logged. */
export const raiseAlert = async (
  notifier: Notifier,
  bus: EventBus,
  logger: Logger,
  alert: Alert
): Promise<void> => {
  bus.emit('alert', alert);
  try {
    await notifier.notify(alert);
  } catch (error) {
    logger.error('Alert delivery failed', { title: alert.title, error: errorMessage(error) });
  }
};
