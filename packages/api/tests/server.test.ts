// Request handler over a loopback server started in this process
import { afterAll, beforeAll, describe, test, expect, vi } from 'vitest';
import { createServer, request, type IncomingHttpHeaders, type Server } from 'http';
import { Readable } from 'stream';
import { setTimeout as sleep } from 'timers/promises';
import { ConversionCache, createRequestHandler, MAX_JSON_BODY_SIZE, parseJsonBody } from '../src/index.js';

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});

  const handler = createRequestHandler({ defaultSystem: 'hepburn', cache: new ConversionCache(10) });
  server = createServer((req, res) => {
    handler(req, res).catch((error) => {
      console.error(error);
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (typeof address === 'object' && address !== null) {
    baseUrl = `http://127.0.0.1:${address.port}`;
  }
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  vi.restoreAllMocks();
});

function post(path: string, payload: string): Promise<Response> {
  return fetch(baseUrl + path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: payload
  });
}

interface RawResponse {
  status: number;
  body: unknown;
}

// Writes each buffer as its own chunk, pausing between writes
function postChunks(
  path: string,
  chunks: Buffer[],
  headers: Record<string, string> = { 'Transfer-Encoding': 'chunked' }
): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = request(
      baseUrl + path,
      { method: 'POST', headers: { 'Content-Type': 'application/json', ...headers } },
      (res) => {
        const parts: Buffer[] = [];
        res.on('data', (part: Buffer) => parts.push(part));
        res.on('end', () => {
          resolve({ status: res.statusCode ?? 0, body: JSON.parse(Buffer.concat(parts).toString('utf8')) });
        });
        res.on('error', reject);
      }
    );
    req.on('error', reject);

    const write = async () => {
      for (const chunk of chunks) {
        req.write(chunk);
        await sleep(20);
      }
      req.end();
    };
    write().catch(reject);
  });
}

function bodySource(chunks: Buffer[], headers: IncomingHttpHeaders = {}) {
  return Object.assign(Readable.from(chunks), { headers });
}

// {"text":" is 9 bytes; byte 10 falls inside the first カ
const KANA_BODY = Buffer.from(JSON.stringify({ text: 'カタカナ' }), 'utf8');
const KANA_CHUNKS = [KANA_BODY.subarray(0, 10), KANA_BODY.subarray(10)];

describe('parseJsonBody', () => {
  test('kana split across chunks is decoded intact', async () => {
    await expect(parseJsonBody(bodySource(KANA_CHUNKS))).resolves.toEqual({ text: 'カタカナ' });
  });

  test('declared length over the limit', async () => {
    const source = bodySource([Buffer.from('{}')], { 'content-length': String(MAX_JSON_BODY_SIZE + 1) });
    await expect(parseJsonBody(source)).rejects.toMatchObject({ name: 'JsonBodyError', status: 413 });
  });

  test('streamed bytes over the limit', async () => {
    const source = bodySource([Buffer.alloc(MAX_JSON_BODY_SIZE), Buffer.alloc(1)]);
    await expect(parseJsonBody(source)).rejects.toMatchObject({ name: 'JsonBodyError', status: 413 });
  });

  test('exactly at the limit is read', async () => {
    const payload = Buffer.alloc(MAX_JSON_BODY_SIZE, 0x20);
    payload.write('{}', 0);
    await expect(parseJsonBody(bodySource([payload]))).resolves.toEqual({});
  });
});

describe('HTTP handler', () => {
  test('encode', async () => {
    const res = await post('/api/encode', JSON.stringify({ text: 'マッチ' }));
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(await res.json()).toEqual({ text: 'マッチ', system: 'hepburn', romaji: 'matchi' });
  });

  test('response log counts UTF-8 bytes', async () => {
    const log = vi.mocked(console.log);
    log.mockClear();
    await post('/api/encode', JSON.stringify({ text: 'マッチ' }));
    const sent = log.mock.calls.flat().find((arg) => typeof arg === 'string' && arg.includes('Response sent'));
    // {"text":"マッチ","system":"hepburn","romaji":"matchi"} is 51 characters, 57 bytes
    expect(sent).toMatch(/Response sent: 57 bytes, status 200$/);
  });

  test('invalid JSON', async () => {
    const res = await post('/api/decode', '{"text":');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON', code: 'InvalidBody' });
  });

  test('empty body', async () => {
    const res = await post('/api/decode', '');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Empty body', code: 'InvalidBody' });
  });

  test('kana split across chunked writes', async () => {
    const res = await postChunks('/api/encode', KANA_CHUNKS);
    expect(res).toEqual({ status: 200, body: { text: 'カタカナ', system: 'hepburn', romaji: 'katakana' } });
  });

  test('Content-Length over the limit is refused before reading', async () => {
    const res = await postChunks('/api/decode', [Buffer.from('{}')], {
      'Content-Length': String(MAX_JSON_BODY_SIZE + 1)
    });
    expect(res).toEqual({ status: 413, body: { error: 'Payload too large', code: 'PayloadTooLarge' } });
  });

  test('chunked body over the limit', async () => {
    const quarter = Buffer.alloc(MAX_JSON_BODY_SIZE / 4, 0x20);
    const res = await postChunks('/api/decode', [quarter, quarter, quarter, quarter, Buffer.from('{}')]);
    expect(res).toEqual({ status: 413, body: { error: 'Payload too large', code: 'PayloadTooLarge' } });
  });

  test('CORS preflight', async () => {
    const res = await fetch(baseUrl + '/api/encode', { method: 'OPTIONS' });
    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });
});
