import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channelPromise: Promise<Channel> | null = null;

export const INVENTORY_EVENTS_EXCHANGE = 'inventory.events';
export const NOTIFICATIONS_QUEUE = 'inventory.notifications';
export const NOTIFICATION_ROUTING_KEY = 'inventory.notification';
const DEAD_LETTER_EXCHANGE = 'dlx.inventory';
const NOTIFICATIONS_DLQ = 'dlq.inventory.notifications';

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, next publish will reconnect');
          connection = null;
          channelPromise = null;
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

async function createChannel(): Promise<Channel> {
     connection = await connect();
     const channel = await connection.createChannel();

     await channel.assertExchange(INVENTORY_EVENTS_EXCHANGE, 'topic', { durable: true });

     // Setup dead letter exchange
     await channel.assertExchange(DEAD_LETTER_EXCHANGE, 'topic', { durable: true });

     await channel.assertQueue(NOTIFICATIONS_QUEUE, {
          durable: true,
          deadLetterExchange: DEAD_LETTER_EXCHANGE,
          deadLetterRoutingKey: NOTIFICATIONS_DLQ,
     });
     await channel.assertQueue(NOTIFICATIONS_DLQ, { durable: true });

     await channel.bindQueue(
          NOTIFICATIONS_QUEUE,
          INVENTORY_EVENTS_EXCHANGE,
          NOTIFICATION_ROUTING_KEY
     );
     await channel.bindQueue(NOTIFICATIONS_DLQ, DEAD_LETTER_EXCHANGE, NOTIFICATIONS_DLQ);

     logger.info('RabbitMQ channel created and configured');
     return channel;
}

// Drop a connection whose channel setup failed, so the next attempt starts clean
async function discardConnection(): Promise<void> {
     const stale = connection;
     connection = null;
     if (!stale) return;
     try {
          await stale.close();
     } catch (err) {
          logger.warn({ err }, 'Failed to close RabbitMQ connection after setup error');
     }
}

/**
 * Shared channel. Concurrent first callers wait on the same connection attempt.
 */
export function getChannel(): Promise<Channel> {
     if (!channelPromise) {
          channelPromise = createChannel().catch(async (err: unknown) => {
               channelPromise = null;
               await discardConnection();
               throw err;
          });
     }
     return channelPromise;
}

export async function publishEvent(
     exchange: string,
     routingKey: string,
     payload: Record<string, unknown>
): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     ch.publish(exchange, routingKey, content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
     });
}

export async function closeConnection(): Promise<void> {
     const pending = channelPromise;
     channelPromise = null;
     if (pending) {
          const channel = await pending;
          await channel.close();
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}
