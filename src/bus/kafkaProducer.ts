/**
 * Kafka Producer Module
 *
 * Manages Kafka producer connection and snapshot publishing.
 * Uses KafkaJS library which is compatible with Kafka and Redpanda brokers.
 */

import { Kafka, logLevel } from 'kafkajs';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import type { SnapshotMessage } from '../models/messages.js';

/**
 * Kafka client instance
 *
 * Log level set to ERROR to reduce noise from KafkaJS internal logs.
 */
const kafka = new Kafka({
  clientId: cfg.kafka.clientId,
  brokers: cfg.kafka.brokers,
  logLevel: logLevel.ERROR
});

export const producer = kafka.producer();

/**
 * Connects the Kafka producer to the broker(s)
 *
 * Must be called before publishing any messages.
 */
export async function startProducer(): Promise<void> {
  logger.info({ brokers: cfg.kafka.brokers }, 'Connecting to Kafka brokers...');
  await producer.connect();
  logger.info({ brokers: cfg.kafka.brokers }, 'Kafka producer connected');
}

/**
 * Disconnects the Kafka producer gracefully
 *
 * Should be called during shutdown to ensure all pending messages are sent.
 */
export async function stopProducer(): Promise<void> {
  await producer.disconnect();
}

/**
 * Publishes a snapshot message to Kafka
 *
 * @param key - Message key (the team path, so one team's snapshots stay ordered)
 * @param value - Message object (will be JSON stringified)
 */
export async function publishSnapshot(key: string, value: SnapshotMessage): Promise<void> {
  await producer.send({
    topic: cfg.kafka.topicSnapshots,
    messages: [{ key, value: JSON.stringify(value) }]
  });
}
