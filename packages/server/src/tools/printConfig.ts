import { config } from '../config.js';
import p from 'node:process';

// Simple diagnostic dump for environment resolution
console.log('Effective config snapshot');
console.log(JSON.stringify({
  telemetryEndpoint: `${config.telemetryHost}:${config.telemetryPort}`,
  serviceName: config.serviceName,
  isTestEnvironment: config.isTestEnvironment,
  readTimeoutMs: config.readTimeoutMs,
  producer: {
    intervalMs: config.producerIntervalMs,
    maxBurst: config.producerMaxBurst,
    reconnectMs: config.producerReconnectMs,
  },
  relay: config.relayEnabled ? { port: config.gatewayPort } : null,
  httpPort: config.httpPort,
  nodeEnv: p.env.NODE_ENV,
}, null, 2));
