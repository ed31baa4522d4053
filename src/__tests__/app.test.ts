// src/__tests__/app.test.ts

import { afterAll, beforeAll, describe, expect, it, jest } from '@jest/globals';
import http from 'node:http';
import { main } from '../app';
import { USAGE } from '../config/cli';

describe('monitor entry point', () => {
  let server: http.Server;
  let statUrl: string;
  let hits = 0;

  beforeAll(async () => {
    // answers without an "actions" object, so every cycle fails
    server = http.createServer((req, res) => {
      hits += 1;
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ version: '3.8' }));
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    statUrl = `http://127.0.0.1:${port}/stat`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('prints usage for --help', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    try {
      await expect(main(['--help'])).resolves.toBe(0);
      expect(logSpy).toHaveBeenCalledWith(USAGE);
    } finally {
      logSpy.mockRestore();
    }
  });

  it('exits with 2 on invalid arguments', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    try {
      await expect(main(['--chart-width', 'zero'])).resolves.toBe(2);
      expect(errorSpy).toHaveBeenNthCalledWith(
        1,
        '--chart-width expects a positive integer, got "zero"',
      );
      expect(errorSpy).toHaveBeenNthCalledWith(2, USAGE);
    } finally {
      errorSpy.mockRestore();
    }
  });

  it('exits with 1 once the poller gives up', async () => {
    const code = await main([
      '--url',
      statUrl,
      '--interval',
      '0.01',
      '--request-timeout',
      '1000',
      '--max-errors',
      '2',
      '--no-chart',
    ]);
    expect(code).toBe(1);
    expect(hits).toBe(3);
  });
});
