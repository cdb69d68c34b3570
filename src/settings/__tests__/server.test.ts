import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import WebSocket from 'ws';

vi.mock('serialport', () => ({
  SerialPort: {
    list: () => Promise.resolve([{ path: '/dev/ttyACM0', vendorId: '2E8A', productId: '000A' }]),
  },
}));

import { startBridge } from '../../bridge.js';
import type { BridgeHandle } from '../../bridge.js';
import { startSettingsServer } from '../server.js';
import type { SettingsServerHandle } from '../server.js';
import type { InputBackend } from '../../actions/backend.js';

function fakeBackend(): InputBackend {
  return {
    openUrl: vi.fn(() => Promise.resolve()),
    launch: vi.fn(() => Promise.resolve()),
    sendKeys: vi.fn(() => Promise.resolve()),
    typeText: vi.fn(() => Promise.resolve()),
    tapMediaKey: vi.fn(() => Promise.resolve()),
  };
}

describe('settings server', () => {
  let dir: string;
  let backend: InputBackend;
  let bridge: BridgeHandle;
  let server: SettingsServerHandle;

  async function call(method: string, path: string, body?: string): Promise<{ status: number; json: unknown }> {
    const res = await fetch(`${server.url}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body,
    });
    const json: unknown = await res.json();
    return { status: res.status, json };
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), 'desk-deck-settings-'));
    backend = fakeBackend();
    bridge = await startBridge({ configPath: join(dir, 'config.yaml'), simulate: true, backend });
    server = await startSettingsServer(bridge, { host: '127.0.0.1', port: 0, html: '<h1>settings</h1>' });
  });

  afterEach(async () => {
    await server.stop();
    await bridge.shutdown();
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('serves the settings page', async () => {
    const res = await fetch(`${server.url}/`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await res.text()).toBe('<h1>settings</h1>');
  });

  it('reports the bridge status', async () => {
    expect(await call('GET', '/api/status')).toEqual({
      status: 200,
      json: {
        state: 'disconnected',
        connected: false,
        portPath: null,
        simulate: true,
        encoder: { lastVolume: 0, muted: false },
      },
    });
  });

  it('lists the buttons', async () => {
    const { status, json } = await call('GET', '/api/buttons');
    expect(status).toBe(200);
    expect(json).toEqual(bridge.getButtons());
  });

  it('lists serial ports', async () => {
    expect(await call('GET', '/api/ports')).toEqual({
      status: 200,
      json: [{ path: '/dev/ttyACM0', vendorId: '2e8a', productId: '000a' }],
    });
  });

  it('saves a button', async () => {
    const { status } = await call('PUT', '/api/buttons/BUTTON_2', JSON.stringify({ type: 'text', value: 'hi' }));
    expect(status).toBe(200);
    expect(bridge.getButtons().BUTTON_2).toEqual({ type: 'text', value: 'hi' });
  });

  it('decodes the key in the path', async () => {
    await call('PUT', '/api/buttons/KNOB%20PRESS', JSON.stringify({ type: 'none', value: '' }));
    expect(bridge.getButtons()['KNOB PRESS']).toEqual({ type: 'none', value: '' });
  });

  it('rejects invalid button bodies with 400', async () => {
    expect(await call('PUT', '/api/buttons/BUTTON_2', JSON.stringify({ type: 'macro', value: 'x' }))).toEqual({
      status: 400,
      json: { ok: false, error: 'unknown action type "macro" (expected one of none, link, exe, keypress, text)' },
    });
    expect(await call('PUT', '/api/buttons/BUTTON_2', JSON.stringify({ type: 'link', value: '' }))).toEqual({
      status: 400,
      json: { ok: false, error: 'buttons.BUTTON_2: action of type "link" needs a non-empty value' },
    });
    expect(await call('PUT', '/api/buttons/BUTTON_2', '{not json')).toEqual({
      status: 400,
      json: { ok: false, error: 'request body must be JSON' },
    });
  });

  it('removes a button once', async () => {
    expect((await call('DELETE', '/api/buttons/BUTTON_9')).status).toBe(200);
    expect(await call('DELETE', '/api/buttons/BUTTON_9')).toEqual({
      status: 404,
      json: { ok: false, error: 'no button BUTTON_9' },
    });
  });

  it('tests a button', async () => {
    expect(await call('POST', '/api/buttons/BUTTON_1/test')).toEqual({ status: 200, json: { ok: true } });
    expect(backend.openUrl).toHaveBeenCalledWith('https://www.youtube.com');
    expect(await call('POST', '/api/buttons/NOPE/test')).toEqual({
      status: 404,
      json: { ok: false, error: 'no action configured for NOPE' },
    });
  });

  it('returns log entries after a cursor', async () => {
    await bridge.feedLine('MEDIA');
    const { json } = await call('GET', '/api/logs?since=1');
    expect(json).toMatchObject({ cursor: 3 });
    expect(await call('GET', '/api/logs?since=abc')).toEqual({
      status: 400,
      json: { ok: false, error: '"since" must be an integer' },
    });
  });

  it('answers unknown routes with 404', async () => {
    expect(await call('GET', '/nope')).toEqual({ status: 404, json: { ok: false, error: 'Not found' } });
  });

  it('streams bridge events over /events', async () => {
    const ws = new WebSocket(`${server.url.replace('http', 'ws')}/events`);
    const messages: unknown[] = [];
    ws.on('message', (data) => messages.push(JSON.parse(String(data))));

    await vi.waitFor(() => expect(messages).toHaveLength(2));
    expect(messages.map(m => (typeof m === 'object' && m !== null && 'type' in m ? m.type : null))).toEqual([
      'status',
      'buttons',
    ]);

    await bridge.feedLine('MEDIA');
    await vi.waitFor(() => expect(messages).toContainEqual({ type: 'line', line: 'MEDIA' }));
    ws.close();
  });
});
