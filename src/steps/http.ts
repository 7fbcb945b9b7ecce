import { Action, inputBoolean, inputString } from './action.js';

function headerRecord(value: unknown): Record<string, string> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return {};
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) out[k] = String(v);
  return out;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Calls an HTTP endpoint, e.g. a deploy hook or a chat notification. */
export const httpAction: Action = {
  name: 'http',
  description: 'Send an HTTP request',
  inputs: {
    url: { required: true },
    method: { default: 'GET' },
    headers: {},
    body: {},
    'fail-on-status': { default: true, description: 'fail the step on non-2xx responses' }
  },
  async execute(inputs, step) {
    const url = inputString(inputs, 'url');
    const method = inputString(inputs, 'method').toUpperCase();
    const body = inputs.body;

    const resp = await fetch(url, {
      method,
      headers: headerRecord(inputs.headers),
      body: method === 'GET' || method === 'HEAD' || body === undefined
        ? undefined
        : typeof body === 'string' ? body : JSON.stringify(body),
      signal: step.job.signal
    });
    const text = await resp.text();
    const json = parseJson(text);
    step.log(`${method} ${url} -> ${resp.status}`);
    const ok = resp.ok || !inputBoolean(inputs, 'fail-on-status');
    return {
      success: ok,
      outputs: { status: resp.status, text, json },
      error: ok ? undefined : `${method} ${url} answered ${resp.status}`
    };
  }
};
