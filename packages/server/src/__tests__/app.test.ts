import request from 'supertest';
import { describe, it, expect } from 'vitest';

import { createApp } from '../app.js';
import { config } from '../config.js';
import { framesDecodedCounter } from '../metrics/registry.js';

describe('HTTP app', () => {
  it('reports liveness with the open connection count', async () => {
    const app = createApp({ connectionCount: 2 });

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', service: config.serviceName, connections: 2 });
  });

  it('exposes telemetry counters in Prometheus format', async () => {
    framesDecodedCounter.inc({ type: 'match' }, 3);
    const app = createApp();

    const res = await request(app).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain('text/plain');
    expect(res.text).toContain('ticktape_frames_decoded_total{type="match"} 3');
  });
});
