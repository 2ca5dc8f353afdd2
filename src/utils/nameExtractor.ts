import http from 'node:http';
import https from 'node:https';
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Match } from '../types';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { byteLength } from './patterns';

const logger = createLogger('name-extractor');

const REQUEST_TIMEOUT_MS = 30_000;
const CONNECT_TIMEOUT_MS = 10_000;
const HEALTH_TIMEOUT_MS = 5_000;

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.8;

const extractResponseSchema = z.object({
  names: z.array(z.string()),
  confidence: z.number(),
  review_id: z.number().int().nullish(),
  is_duplicate: z.boolean().nullish(),
});

const healthResponseSchema = z.object({
  status: z.string().default(''),
});

export type NameLookup =
  | {
      status: 'ok';
      names: string[];
      confidence: number;
      reviewId?: number;
      isDuplicate?: boolean;
    }
  | { status: 'unavailable'; reason: string };

export type HealthCheck = { ok: true; message: string } | { ok: false; message: string };

/**
 * 外部姓名辨識服務
 */
export interface NameService {
  extract(text: string): Promise<NameLookup>;
  checkHealth(): Promise<HealthCheck>;
}

/**
 * 建立連線階段的 socket，連上或關閉前只需要這幾個成員
 */
export interface ConnectingSocket {
  readonly connecting: boolean;
  once(event: 'connect' | 'close', listener: () => void): unknown;
  destroy(error?: Error): unknown;
}

/**
 * 連線階段超時：socket 在時限內沒連上就中止，連上後只受整體 timeout 限制
 */
export function limitConnectPhase(socket: ConnectingSocket, timeoutMs: number): void {
  if (!socket.connecting) return;

  const timer = setTimeout(() => {
    socket.destroy(new Error(`连接超时: ${timeoutMs}ms`));
  }, timeoutMs);
  const clear = (): void => clearTimeout(timer);
  socket.once('connect', clear);
  socket.once('close', clear);
}

/**
 * axios 的 transport：照常用 http/https 發送，並替每個新 socket 加上連線超時
 */
export function connectTimeoutTransport(timeoutMs: number) {
  return {
    request(options: http.RequestOptions, callback: (response: http.IncomingMessage) => void): http.ClientRequest {
      const request = options.protocol === 'https:' ? https.request(options, callback) : http.request(options, callback);
      request.on('socket', (socket) => limitConnectPhase(socket, timeoutMs));
      return request;
    },
  };
}

export function normalizeApiHost(apiHost: string): string {
  const host = apiHost.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(host) ? host : `http://${host}`;
}

/**
 * 透過 HTTP 呼叫姓名辨識服務。任何失敗都回傳 unavailable，不丟出例外。
 */
export class HttpNameService implements NameService {
  private readonly http: AxiosInstance;

  constructor(apiHost: string, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: normalizeApiHost(apiHost),
        timeout: REQUEST_TIMEOUT_MS,
        transport: connectTimeoutTransport(CONNECT_TIMEOUT_MS),
        headers: { accept: 'application/json' },
      });
  }

  async extract(text: string): Promise<NameLookup> {
    try {
      const response = await this.http.post('/api/extract', { text }, { validateStatus: () => true });
      if (response.status < 200 || response.status >= 300) {
        return { status: 'unavailable', reason: `API 返回状态码: ${response.status}` };
      }

      const parsed = extractResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        return { status: 'unavailable', reason: `解析响应失败: ${parsed.error.issues[0]?.message ?? 'invalid body'}` };
      }

      return {
        status: 'ok',
        names: parsed.data.names,
        confidence: parsed.data.confidence,
        reviewId: parsed.data.review_id ?? undefined,
        isDuplicate: parsed.data.is_duplicate ?? undefined,
      };
    } catch (error) {
      return { status: 'unavailable', reason: `请求失败: ${errorMessage(error)}` };
    }
  }

  async checkHealth(): Promise<HealthCheck> {
    try {
      const response = await this.http.get('/api/health', {
        timeout: HEALTH_TIMEOUT_MS,
        validateStatus: () => true,
      });
      if (response.status < 200 || response.status >= 300) {
        return { ok: false, message: `API 返回状态码: ${response.status}` };
      }

      // 狀態碼正常但內容無法解析時仍視為連線正常
      const parsed = healthResponseSchema.safeParse(response.data);
      return {
        ok: true,
        message: parsed.success && parsed.data.status ? `连接正常: ${parsed.data.status}` : '连接正常',
      };
    } catch (error) {
      return { ok: false, message: `连接失败: ${errorMessage(error)}` };
    }
  }
}

export interface NameExtractorOptions {
  confidenceThreshold?: number;
}

/**
 * 把姓名服務的結果轉成 Match，失敗時回傳空陣列並累計失敗次數
 */
export class NameExtractor {
  private failed = 0;
  private readonly confidenceThreshold: number;

  constructor(
    private readonly service: NameService,
    options: NameExtractorOptions = {},
  ) {
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  }

  get failedCount(): number {
    return this.failed;
  }

  resetFailedCount(): void {
    this.failed = 0;
  }

  checkConnection(): Promise<HealthCheck> {
    return this.service.checkHealth();
  }

  async extract(text: string): Promise<Match[]> {
    if (text.trim() === '') return [];

    const lookup = await this.service.extract(text);
    if (lookup.status === 'unavailable') {
      this.failed++;
      logger.warn('姓名提取失败', { reason: lookup.reason });
      return [];
    }

    logger.debug('姓名提取成功', { names: lookup.names, confidence: lookup.confidence });
    return locateNames(text, lookup.names, lookup.confidence >= this.confidenceThreshold);
  }
}

/**
 * 依序在原文中定位姓名；找不到的姓名無法給出位置，直接略過
 */
export function locateNames(text: string, names: string[], isValid: boolean): Match[] {
  const matches: Match[] = [];
  let cursor = 0;

  for (const name of names) {
    if (name === '') continue;

    let index = text.indexOf(name, cursor);
    if (index === -1) {
      // 服務回傳的順序不一定與原文一致
      index = text.indexOf(name);
    }
    if (index === -1) {
      logger.debug('姓名不在原文中，略过', { name });
      continue;
    }

    const start = byteLength(text.slice(0, index));
    matches.push({ value: name, isValid, position: [start, start + byteLength(name)] });
    cursor = Math.max(cursor, index + name.length);
  }

  return matches.sort((a, b) => a.position[0] - b.position[0]);
}
