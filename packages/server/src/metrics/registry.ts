import { Registry, collectDefaultMetrics, Counter, Gauge } from 'prom-client';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'ticktape_' });

export const framesEncodedCounter = new Counter({
  name: 'ticktape_frames_encoded_total',
  help: 'Frames written by the producer',
  labelNames: ['type'],
});

export const framesDecodedCounter = new Counter({
  name: 'ticktape_frames_decoded_total',
  help: 'Frames decoded by the consumer',
  labelNames: ['type'],
});

export const bytesReceivedCounter = new Counter({
  name: 'ticktape_bytes_received_total',
  help: 'Raw bytes read from producer connections',
});

export const connectionFailuresCounter = new Counter({
  name: 'ticktape_connection_failures_total',
  help: 'Connections terminated by a protocol or transport error',
  labelNames: ['code'],
});

export const openConnectionsGauge = new Gauge({
  name: 'ticktape_open_connections',
  help: 'Producer connections currently attached to the consumer',
});

registry.registerMetric(framesEncodedCounter);
registry.registerMetric(framesDecodedCounter);
registry.registerMetric(bytesReceivedCounter);
registry.registerMetric(connectionFailuresCounter);
registry.registerMetric(openConnectionsGauge);
