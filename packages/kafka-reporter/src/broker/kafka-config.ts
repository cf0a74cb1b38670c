import type { KafkaConfig } from 'kafkajs';
import { envBool, envInt, envList, envOptionalString, envString, type EnvSource } from '@metrics-relay/platform-core';

export type KafkaSaslConfig = KafkaConfig['sasl'];

export interface KafkaProducerConfig {
  brokers: string[];
  clientId: string;
  ssl: boolean;
  sasl?: KafkaSaslConfig;
  /** Sends awaiting acknowledgment before further sends are refused. */
  maxInFlight: number;
  acks: number;
}

function resolveSasl(env: EnvSource): KafkaSaslConfig {
  const mechanism = envOptionalString('KAFKA_SASL_MECHANISM', env)?.toLowerCase();
  const username = envOptionalString('KAFKA_SASL_USERNAME', env);
  const password = envOptionalString('KAFKA_SASL_PASSWORD', env);
  if (!mechanism || !username || !password) return undefined;

  switch (mechanism) {
    case 'plain':
      return { mechanism: 'plain', username, password };
    case 'scram-sha-256':
      return { mechanism: 'scram-sha-256', username, password };
    case 'scram-sha-512':
      return { mechanism: 'scram-sha-512', username, password };
    default:
      throw new Error(`Unsupported KAFKA_SASL_MECHANISM: ${mechanism}`);
  }
}

function resolveAcks(env: EnvSource): number {
  const acks = envInt('KAFKA_ACKS', -1, env);
  if (acks !== -1 && acks !== 0 && acks !== 1) {
    throw new Error(`Invalid KAFKA_ACKS: ${acks}. Must be -1, 0 or 1`);
  }
  return acks;
}

/**
 * Producer settings; each field not given in `overrides` is read from its
 * KAFKA_* variable, so a supplied setting never consults the environment.
 */
export function loadKafkaProducerConfig(
  env: EnvSource = process.env,
  overrides: Partial<KafkaProducerConfig> = {}
): KafkaProducerConfig {
  return {
    brokers: overrides.brokers ?? envList('KAFKA_BROKERS', ['localhost:9092'], env),
    clientId: overrides.clientId ?? envString('KAFKA_CLIENT_ID', 'metrics-relay', env),
    ssl: overrides.ssl ?? envBool('KAFKA_SSL', false, env),
    sasl: overrides.sasl ?? resolveSasl(env),
    maxInFlight: Math.max(1, overrides.maxInFlight ?? envInt('KAFKA_MAX_IN_FLIGHT', 1000, env)),
    acks: overrides.acks ?? resolveAcks(env),
  };
}
