import { afterAll, beforeEach, describe, expect, it } from '@jest/globals';
import request from 'supertest';
import { createStatsServer } from '../server';
import { StatMonitorState } from '../services/StatMonitorState';

describe('stats routes', () => {
  let state: StatMonitorState;
  let exported: ReturnType<typeof createStatsServer>;
  const servers: Array<ReturnType<typeof createStatsServer>> = [];

  beforeEach(async () => {
    state = new StatMonitorState(5);
    exported = createStatsServer(state, {
      mode: 'development',
      liveEmitEnabled: false,
    });
    servers.push(exported);
    await state.runExclusive(stats => {
      stats.updateFromSnapshot(
        {
          actions: { reject: 10, 'no action': 20, 'add header': 5 },
          scan_times: [0.25, 0.75],
        },
        1000,
      );
      stats.updateFromSnapshot(
        {
          actions: { reject: 20, 'no action': 40, 'add header': 15 },
          scan_times: [0.5],
        },
        1000,
      );
    });
  });

  afterAll(() => {
    servers.forEach(s => s.sockets.io.close());
  });

  it('GET /health reports poller status', async () => {
    state.noteFailure('timeout');
    const res = await request(exported.app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'ok',
      polling: false,
      cycles: 0,
      consecutiveErrors: 1,
      lastError: 'timeout',
    });
  });

  it('reflects any request origin in CORS headers', async () => {
    const res = await request(exported.app)
      .get('/api/stats')
      .set('Origin', 'http://dashboard.test');
    expect(res.status).toBe(200);
    expect(res.headers['access-control-allow-origin']).toBe('http://dashboard.test');
  });

  it('GET /api/stats returns every metric view', async () => {
    const res = await request(exported.app).get('/api/stats');
    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data.map((v: { id: string }) => v.id)).toEqual([
      'reject',
      'clean',
      'flagged',
      'total',
      'scanTime',
    ]);
    expect(res.body.data[0]).toEqual({
      id: 'reject',
      label: 'spam msg/sec',
      kind: 'rate',
      capacity: 5,
      history: [10],
      summary: { last: 10, avg: 10, min: 10, max: 10, count: 1 },
    });
  });

  it('GET /api/stats/:metric returns one view', async () => {
    const res = await request(exported.app).get('/api/stats/total');
    expect(res.status).toBe(200);
    expect(res.body.data.history).toEqual([40]);

    const gauge = await request(exported.app).get('/api/stats/scanTime');
    expect(gauge.body.data.history).toEqual([0.5, 0.5]);
  });

  it('GET /api/stats/:metric answers 404 for unknown metrics', async () => {
    const res = await request(exported.app).get('/api/stats/bounces');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      code: 'NOT_FOUND',
      message: 'Unknown metric: bounces',
    });
  });

  it('POST /api/stats/reset clears the windows', async () => {
    const res = await request(exported.app).post('/api/stats/reset');
    expect(res.status).toBe(200);
    const after = await request(exported.app).get('/api/stats/reject');
    expect(after.body.data.history).toEqual([]);
    expect(after.body.data.summary).toBeNull();
  });

  it('GET /metrics exposes Prometheus text', async () => {
    const res = await request(exported.app).get('/metrics');
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/plain/);
    const lines = res.text.split('\n');
    expect(lines).toContain('scanstat_metric_value{metric="reject",stat="last"} 10');
    expect(lines).toContain('scanstat_metric_value{metric="total",stat="max"} 40');
    expect(lines).toContain('scanstat_metric_value{metric="scanTime",stat="avg"} 0.5');
    expect(lines).toContain('scanstat_metric_samples{metric="clean"} 1');
  });

  it('live-emit toggle validates and applies the flag', async () => {
    const status = await request(exported.app).get('/api/stats/live-emit');
    expect(status.body.data.enabled).toBe(false);

    const bad = await request(exported.app).post('/api/stats/live-emit').send({});
    expect(bad.status).toBe(400);

    const ok = await request(exported.app)
      .post('/api/stats/live-emit')
      .send({ enabled: true });
    expect(ok.status).toBe(200);
    expect(exported.sockets.isLiveEmitEnabled()).toBe(true);
  });
});
