/**
 * Bank API Client
 *
 * Typed wrapper over the JSON API for scripts and other services. Every
 * non-2xx response is raised as an AppError carrying the server's status
 * code and message, so callers can branch on `err.statusCode === 404`.
 *
 * `fetch` is injectable; the default is the global one.
 */
import type { Bank, BankPatch, NewBank } from '@domain/entities/Bank';
import { AppError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

type FetchFn = typeof fetch;

const bankSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  location: z.string(),
});

const errorBodySchema = z.object({ message: z.string() });

/** The `message` of an `{ status: 'error', message }` body, if that is what came back. */
function errorMessage(text: string): string | null {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.message : null;
  } catch {
    return null;
  }
}

export class BankApiClient {
  private readonly banksUrl: string;

  constructor(
    baseUrl: string,
    private readonly fetchFn: FetchFn = (input, init) => fetch(input, init),
  ) {
    this.banksUrl = `${baseUrl.replace(/\/+$/, '')}/api/banks`;
  }

  async list(): Promise<Bank[]> {
    const body = await this.request('GET', this.banksUrl);
    return z.array(bankSchema).parse(body);
  }

  async get(id: number): Promise<Bank> {
    return bankSchema.parse(await this.request('GET', `${this.banksUrl}/${id}`));
  }

  async create(bank: NewBank): Promise<Bank> {
    return bankSchema.parse(await this.request('POST', this.banksUrl, bank));
  }

  /** Only the fields present in `patch` are sent, and only those change. */
  async update(id: number, patch: BankPatch): Promise<Bank> {
    const payload: BankPatch = {};
    if (patch.name !== undefined) payload.name = patch.name;
    if (patch.location !== undefined) payload.location = patch.location;

    return bankSchema.parse(await this.request('PUT', `${this.banksUrl}/${id}`, payload));
  }

  async delete(id: number): Promise<void> {
    await this.request('DELETE', `${this.banksUrl}/${id}`);
  }

  private async request(method: string, url: string, payload?: unknown): Promise<unknown> {
    const res = await this.fetchFn(url, {
      method,
      headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: payload === undefined ? undefined : JSON.stringify(payload),
    });

    const text = await res.text();

    if (!res.ok) {
      const detail = errorMessage(text) ?? res.statusText;
      throw new AppError(`${method} ${url} failed with ${res.status}: ${detail}`, res.status);
    }

    const body: unknown = text ? JSON.parse(text) : null;
    return body;
  }
}
