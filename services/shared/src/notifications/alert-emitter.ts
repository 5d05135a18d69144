import {
     INVENTORY_EVENTS_EXCHANGE,
     NOTIFICATION_ROUTING_KEY,
     publishEvent,
} from '../messaging/client';
import { logger } from '../utils/logger';

/**
 * Receiver of low-stock alerts and settlement outcomes. Delivery (SMS, chat) happens
 * downstream; implementations are best-effort.
 */
export interface AlertEmitter {
     notify(message: string): Promise<void>;
}

export class LogAlertEmitter implements AlertEmitter {
     async notify(message: string): Promise<void> {
          logger.warn({ notification: message }, 'Inventory notification');
     }
}

type Publish = typeof publishEvent;

export class AmqpAlertEmitter implements AlertEmitter {
     constructor(private readonly publish: Publish = publishEvent) {}

     async notify(message: string): Promise<void> {
          await this.publish(INVENTORY_EVENTS_EXCHANGE, NOTIFICATION_ROUTING_KEY, {
               message,
               timestamp: new Date().toISOString(),
          });
          logger.debug({ notification: message }, 'Notification published');
     }
}

async function deliver(emitter: AlertEmitter, message: string): Promise<void> {
     try {
          await emitter.notify(message);
     } catch (error) {
          logger.warn({ err: error, notification: message }, 'Failed to emit notification');
     }
}

/**
 * Hand every message to the emitter, in order, without waiting for one delivery before
 * starting the next. Never rejects: failures are logged.
 */
export async function notifyAll(emitter: AlertEmitter, messages: string[]): Promise<void> {
     await Promise.all(messages.map((message) => deliver(emitter, message)));
}

export function createAlertEmitter(): AlertEmitter {
     const emitterType = process.env.ALERT_EMITTER || 'log';

     if (emitterType === 'log') {
          logger.info('Using log alert emitter');
          return new LogAlertEmitter();
     }

     if (emitterType === 'amqp') {
          logger.info('Using AMQP alert emitter');
          return new AmqpAlertEmitter();
     }

     throw new Error(`Unknown ALERT_EMITTER '${emitterType}', expected 'log' or 'amqp'`);
}
