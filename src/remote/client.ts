/**
 * Client for the remote story server
 */

import { responseCodeFromText } from './codes.js';
import type { ResponseQueue, ResponseReceipt } from './queue.js';

export type RemotePurpose = 'verify' | 'remote_save' | 'remote_get' | 'remote_call';

export interface RemoteConfig {
  address: string;
  key: string;
  storyName: string;
  /** Replaced in tests */
  fetch?: typeof fetch | undefined;
}

/**
 * Handle on an in-flight request
 * Cancelling drops the response; the network call itself still finishes.
 */
export interface RemoteRequest {
  purpose: RemotePurpose;
  cancelled: boolean;
  /** Settles once the response is queued or dropped */
  done: Promise<void>;
}

export interface RemoteClient {
  send(
    purpose: RemotePurpose,
    data: Record<string, string>,
    callback: (receipt: ResponseReceipt) => void
  ): RemoteRequest;
}

/**
 * Read response text and an optional value from a response body
 * The body is either a JSON string or { result, value }.
 */
export function readResponseBody(body: unknown): { text: string; value: string | null } {
  if (typeof body === 'string') {
    return { text: body, value: null };
  }
  if (typeof body === 'object' && body !== null && 'result' in body) {
    const { result } = body;
    const value = 'value' in body ? body.value : null;
    return {
      text: typeof result === 'string' ? result : '',
      value: typeof value === 'string' ? value : null,
    };
  }
  return { text: '', value: null };
}

/**
 * Create a client that queues responses for the frame loop
 * Requests other than verify keep the main reader paused until handled.
 */
export function createRemoteClient(config: RemoteConfig, queue: ResponseQueue): RemoteClient {
  const host = config.address.replace(/\/+$/, ''); // Remove trailing slashes
  const doFetch = config.fetch ?? fetch;

  return {
    send(purpose, data, callback): RemoteRequest {
      const blocking = purpose !== 'verify';
      if (blocking) queue.track();

      const request: RemoteRequest = {
        purpose,
        cancelled: false,
        done: Promise.resolve(),
      };

      const body = JSON.stringify({
        license_key: config.key,
        vn_name: config.storyName,
        ...data,
      });

      request.done = (async (): Promise<void> => {
        let receipt: ResponseReceipt;
        try {
          const response = await doFetch(`${host}/${purpose}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body,
          });
          const { text, value } = readResponseBody(await response.json());
          receipt = { code: responseCodeFromText(text), text, value, callback, blocking };
        } catch (err) {
          const text = err instanceof Error ? err.message : String(err);
          receipt = { code: 'connection_error', text, value: null, callback, blocking };
        }

        if (request.cancelled) {
          if (blocking) queue.release();
          return;
        }
        queue.push(receipt);
      })();

      return request;
    },
  };
}
