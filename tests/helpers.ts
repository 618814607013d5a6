// =============================================================================
// BASTION — HTTP Test Helpers
//
// Starts the real Express app on an ephemeral port against the in-memory
// harness, and a small fetch wrapper for requests against it.
// =============================================================================

import express from 'express';
import { Server } from 'http';
import { AddressInfo } from 'net';
import fetch, { Response } from 'node-fetch';
import { createApp } from '../src/app';
import { issueToken } from '../src/middleware/authenticate';
import { Principal } from '../src/types/auth';
import { Harness, PASSWORD } from './fakes';

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Listen on an ephemeral port; resolves once the socket is bound */
export function listen(app: express.Express): Promise<TestServer> {
  return new Promise((resolve) => {
    const server = app.listen(0, () => {
      const { port } = addressOf(server);
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () => new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done()))),
      });
    });
  });
}

function addressOf(server: Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error(`Unexpected server address: ${String(address)}`);
  }
  return address;
}

export function startTestApp(harness: Harness, healthCheck?: () => Promise<void>): Promise<TestServer> {
  return listen(createApp({ services: harness.services, healthCheck }));
}

/**
 * Make an API request. Returns the raw Response for flexible assertion.
 */
export function api(
  server: TestServer,
  method: string,
  path: string,
  body?: unknown,
  token?: string,
): Promise<Response> {
  const headers: Record<string, string> = {};
  if (token) headers['Authorization'] = `Bearer ${token}`;
  if (body !== undefined) headers['Content-Type'] = 'application/json';

  return fetch(`${server.baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

/**
 * Parse a JSON response with error context. The caller names the shape it
 * expects; assertions check the values.
 */
export async function json<T>(res: Response): Promise<T> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}

/** Bearer token for a principal, without going through /login */
export function tokenFor(harness: Harness, principal: Principal): string {
  return issueToken(principal, harness.config.jwt);
}

/** Log in through the API with the shared test password */
export async function login(server: TestServer, userId: string): Promise<string> {
  const res = await api(server, 'POST', '/api/auth/login', {
    email: `${userId}@example.com`,
    password: PASSWORD,
  });
  const body = await json<{ token?: string; error?: string }>(res);
  if (res.status !== 200 || !body.token) {
    throw new Error(`Login failed for ${userId}: ${JSON.stringify(body)}`);
  }
  return body.token;
}
