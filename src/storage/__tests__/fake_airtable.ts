/**
 * @fileoverview Airtable REST stand-in for store and engine tests
 */

export interface FakeRecord {
  id: string;
  fields: Record<string, string>;
}

export interface RecordedRequest {
  method: string;
  url: URL;
  body: unknown;
  authorization: string | null;
}

/**
 * In-process stand-in for one Airtable table. Pages hold two records so
 * that pagination is exercised, and empty fields are dropped on create the
 * way Airtable does.
 */
export class FakeAirtableTable {
  records: FakeRecord[] = [];
  requests: RecordedRequest[] = [];
  failWith: number | null = null;
  private nextId = 1;

  readonly fetch: typeof fetch = async (input, init) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const method = init?.method ?? 'GET';
    const headers = new Headers(init?.headers);
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    this.requests.push({ method, url, body, authorization: headers.get('Authorization') });

    if (this.failWith !== null) {
      return new Response(JSON.stringify({ error: 'failed' }), { status: this.failWith });
    }
    if (method === 'POST') return this.create(body);
    if (method === 'DELETE') return this.remove(url.searchParams.getAll('records[]'));
    return this.list(url.searchParams);
  };

  private create(body: unknown): Response {
    const created: FakeRecord[] = [];
    if (isRecordBatch(body)) {
      for (const record of body.records) {
        const fields = Object.fromEntries(Object.entries(record.fields).filter(([, value]) => value !== ''));
        const stored = { id: `rec${this.nextId++}`, fields };
        this.records.push(stored);
        created.push(stored);
      }
    }
    return jsonResponse({ records: created });
  }

  private remove(ids: string[]): Response {
    this.records = this.records.filter((record) => !ids.includes(record.id));
    return jsonResponse({ records: ids.map((id) => ({ id, deleted: true })) });
  }

  private list(params: URLSearchParams): Response {
    const sessionMatch = /\{Session ID\} = '(.*)'/.exec(params.get('filterByFormula') ?? '');
    const direction = params.get('sort[0][direction]') === 'desc' ? -1 : 1;
    const matching = this.records
      .filter((record) => !sessionMatch || record.fields['Session ID'] === sessionMatch[1])
      .sort((a, b) => direction * (a.fields.Timestamp ?? '').localeCompare(b.fields.Timestamp ?? ''));
    const start = Number(params.get('offset') ?? '0');
    const page = matching.slice(start, start + 2);
    const next = start + 2 < matching.length ? String(start + 2) : undefined;
    return jsonResponse(next ? { records: page, offset: next } : { records: page });
  }
}

function jsonResponse(payload: unknown): Response {
  return new Response(JSON.stringify(payload), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function isRecordBatch(value: unknown): value is { records: Array<{ fields: Record<string, string> }> } {
  return typeof value === 'object' && value !== null && 'records' in value && Array.isArray(value.records);
}
