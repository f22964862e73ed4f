import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Server } from 'http';
import { createApp, type Verifier } from './app.js';
import { escapeHtml, photoUrl } from './pages.js';
import type { Outcome } from '../verification/outcome.js';

let server: Server;
let baseUrl: string;
let photosDir: string;
let nextOutcome: Outcome;
const verifier = {
  evaluate: vi.fn<Verifier['evaluate']>(async () => nextOutcome),
};

beforeEach(async () => {
  photosDir = fs.mkdtempSync(path.join(os.tmpdir(), 'http-photos-'));
  nextOutcome = { kind: 'person_unknown' };
  verifier.evaluate.mockClear();
  const app = createApp(verifier, photosDir);
  await new Promise<void>((resolve) => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
  fs.rmSync(photosDir, { recursive: true, force: true });
});

function postForm(password: string): Promise<Response> {
  return fetch(`${baseUrl}/submit`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({ password }).toString(),
  });
}

describe('pages', () => {
  it('escapes markup', () => {
    expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe('&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;');
  });

  it('links photos by file name only', () => {
    expect(photoUrl('photos/photo_20240102_030405.png')).toBe('/photos/photo_20240102_030405.png');
  });
});

describe('HTTP front end', () => {
  it('serves the password form', async () => {
    const res = await fetch(`${baseUrl}/`);
    const body = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toMatch(/^text\/html/);
    expect(body).toContain('<input type="password" id="password" name="password" autocomplete="off" autofocus>');
  });

  it('passes the submitted password to the engine verbatim', async () => {
    await postForm(' monSecret ');

    expect(verifier.evaluate).toHaveBeenCalledWith(' monSecret ');
  });

  it('renders a recognised person', async () => {
    nextOutcome = { kind: 'person_recognized', label: 'alice' };

    const body = await (await postForm('monSecret')).text();

    expect(body).toContain('<p class="ok">Correct secret. Welcome, alice!</p>');
    expect(body).toContain('<p class="person">alice</p>');
  });

  it('escapes labels coming from file names', async () => {
    nextOutcome = { kind: 'person_recognized', label: '<script>x</script>' };

    const body = await (await postForm('monSecret')).text();

    expect(body).toContain('<p class="person">&lt;script&gt;x&lt;/script&gt;</p>');
  });

  it('links the intrusion photo on a wrong secret', async () => {
    nextOutcome = { kind: 'secret_rejected', photoPath: path.join(photosDir, 'photo_20240102_030405.png') };

    const res = await postForm('wrong');
    const body = await res.text();

    expect(res.status).toBe(200);
    expect(body).toContain('<a href="/photos/photo_20240102_030405.png">');
  });

  it('treats a missing password field as an empty secret', async () => {
    await fetch(`${baseUrl}/submit`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: '',
    });

    expect(verifier.evaluate).toHaveBeenCalledWith('');
  });

  it('answers the JSON endpoint with the rendered outcome', async () => {
    nextOutcome = { kind: 'recognition_skipped_no_gallery' };

    const res = await fetch(`${baseUrl}/api/verify`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ secret: 'monSecret' }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      outcome: 'recognition_skipped_no_gallery',
      status: 'ok',
      message: 'Correct secret. No reference faces found. Recognition skipped.',
    });
  });

  it('rejects a JSON body without a secret', async () => {
    const res = await fetch(`${baseUrl}/api/verify`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ password: 'monSecret' }),
    });

    expect(res.status).toBe(400);
    expect(verifier.evaluate).not.toHaveBeenCalled();
  });

  it.each([
    ['truncated JSON', '{"secret":'],
    ['a JSON null', 'null'],
  ])('answers 400 to %s without calling the engine', async (_name, body) => {
    const res = await fetch(`${baseUrl}/api/verify`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid request body' });
    expect(verifier.evaluate).not.toHaveBeenCalled();
  });

  it('uses the first value of a repeated password field', async () => {
    await fetch(`${baseUrl}/submit`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'password=monSecret&password=other',
    });

    expect(verifier.evaluate).toHaveBeenCalledWith('monSecret');
  });

  it('serves stored photos', async () => {
    fs.writeFileSync(path.join(photosDir, 'photo_20240102_030405.png'), 'png-bytes');

    const res = await fetch(`${baseUrl}/photos/photo_20240102_030405.png`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('png-bytes');
  });

  it('returns 500 when the engine throws', async () => {
    verifier.evaluate.mockRejectedValueOnce(new Error('unexpected'));

    const res = await postForm('monSecret');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error' });
  });
});
