/**
 * In-process stand-in for the task service, plugged into axios as its
 * adapter. Replies are scripted per request; unscripted requests get the
 * default reply.
 */

import {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  /** Serialized request body, undefined when none was sent */
  body: string | undefined;
  contentType: string;
  accept: string;
  userAgent: string;
}

export type ScriptedReply =
  | { status: number; body?: unknown; delayMs?: number }
  | { errorCode: string; message?: string }
  | { error: Error };

function headerText(config: InternalAxiosRequestConfig, name: string): string {
  const value = config.headers.get(name);
  return value === undefined || value === null ? '' : String(value);
}

export class MockHttpAdapter {
  readonly requests: RecordedRequest[] = [];
  private replies: ScriptedReply[] = [];
  private fallback: ScriptedReply = {
    status: 200,
    body: { code: 200, success: true, message: 'success', data: null },
  };

  /**
   * Queue replies for the next requests, in order
   */
  reply(...replies: ScriptedReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  /**
   * Reply used once the queue is empty
   */
  setDefault(reply: ScriptedReply): this {
    this.fallback = reply;
    return this;
  }

  get lastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  readonly adapter: AxiosAdapter = async (config) => {
    this.requests.push({
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      body: typeof config.data === 'string' ? config.data : undefined,
      contentType: headerText(config, 'Content-Type'),
      accept: headerText(config, 'Accept'),
      userAgent: headerText(config, 'User-Agent'),
    });

    const reply = this.replies.shift() ?? this.fallback;
    if ('error' in reply) {
      throw reply.error;
    }
    if ('errorCode' in reply) {
      throw new AxiosError(reply.message ?? reply.errorCode, reply.errorCode, config);
    }
    if (reply.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, reply.delayMs));
    }

    const response: AxiosResponse<string> = {
      data:
        reply.body === undefined
          ? ''
          : typeof reply.body === 'string'
            ? reply.body
            : JSON.stringify(reply.body),
      status: reply.status,
      statusText: '',
      headers: new AxiosHeaders(),
      config,
    };
    return response;
  };
}
