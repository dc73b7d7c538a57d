/**
 * Response Builder
 *
 * Fluent builder a handler mutates in place, plus the HTTP/1.1 wire
 * serializer the connection writes from.
 */

export const DEFAULT_CONTENT_TYPE = 'text/plain';

/**
 * Reason phrases for the status codes the server knows by name
 */
export const STATUS_TEXT: Readonly<Record<number, string>> = {
  100: 'Continue',
  101: 'Switching Protocols',
  200: 'OK',
  201: 'Created',
  202: 'Accepted',
  204: 'No Content',
  301: 'Moved Permanently',
  302: 'Found',
  304: 'Not Modified',
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  500: 'Internal Server Error',
  501: 'Not Implemented',
  503: 'Service Unavailable',
};

export function reasonPhrase(statusCode: number): string {
  return Object.hasOwn(STATUS_TEXT, statusCode) ? STATUS_TEXT[statusCode] : 'Unknown Status';
}

/**
 * Response builder
 */
export class HttpResponse {
  private _status = 200;
  private _headers = new Map<string, string>([['Content-Type', DEFAULT_CONTENT_TYPE]]);
  private _body: Buffer = Buffer.alloc(0);

  get statusCode(): number {
    return this._status;
  }

  /**
   * Headers in insertion order
   */
  get headers(): ReadonlyMap<string, string> {
    return this._headers;
  }

  get body(): Buffer {
    return this._body;
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    if (!Number.isInteger(code) || code < 100 || code > 999) {
      throw new RangeError(`Invalid status code: ${code}`);
    }
    this._status = code;
    return this;
  }

  /**
   * Set a response header. A header already present under another letter case
   * is replaced in place.
   */
  header(name: string, value: string): this {
    assertHeaderText(name, 'name');
    assertHeaderText(value, 'value');
    this._headers.set(this.existingKey(name) ?? name, value);
    return this;
  }

  getHeader(name: string): string | undefined {
    const key = this.existingKey(name);
    return key === undefined ? undefined : this._headers.get(key);
  }

  removeHeader(name: string): this {
    const key = this.existingKey(name);
    if (key !== undefined) {
      this._headers.delete(key);
    }
    return this;
  }

  /**
   * Set the Content-Type header
   */
  type(contentType: string): this {
    return this.header('Content-Type', contentType);
  }

  /**
   * Set a raw body, optionally with its Content-Type
   */
  send(body: Buffer | string, contentType?: string): this {
    this._body = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
    if (contentType !== undefined) {
      this.type(contentType);
    }
    return this;
  }

  /**
   * Plain text body
   */
  text(content: string): this {
    return this.send(content, 'text/plain');
  }

  /**
   * HTML body
   */
  html(content: string): this {
    return this.send(content, 'text/html');
  }

  /**
   * JSON body
   */
  json(data: unknown): this {
    // undefined and functions stringify to undefined
    const serialized: string | undefined = JSON.stringify(data);
    return this.send(serialized ?? 'null', 'application/json');
  }

  /**
   * Redirect to another location
   */
  redirect(location: string, status: 301 | 302 = 302): this {
    return this.status(status).header('Location', location).send('');
  }

  /**
   * Back to a fresh 200 text/plain response with an empty body
   */
  reset(): this {
    this._status = 200;
    this._headers = new Map([['Content-Type', DEFAULT_CONTENT_TYPE]]);
    this._body = Buffer.alloc(0);
    return this;
  }

  private existingKey(name: string): string | undefined {
    if (this._headers.has(name)) return name;

    const lower = name.toLowerCase();
    for (const key of this._headers.keys()) {
      if (key.toLowerCase() === lower) return key;
    }
    return undefined;
  }
}

/**
 * Serialize a response for the wire: status line, headers in insertion
 * order, a computed Content-Length, a blank line, then the body.
 */
export function serializeResponse(res: HttpResponse): Buffer {
  let head = `HTTP/1.1 ${res.statusCode} ${reasonPhrase(res.statusCode)}\r\n`;

  for (const [name, value] of res.headers) {
    // Content-Length always reflects the final body
    if (name.toLowerCase() === 'content-length') continue;
    head += `${name}: ${value}\r\n`;
  }

  head += `Content-Length: ${res.body.length}\r\n\r\n`;

  return Buffer.concat([Buffer.from(head, 'utf8'), res.body]);
}

function assertHeaderText(text: string, part: 'name' | 'value'): void {
  if (/[\r\n]/.test(text)) {
    throw new TypeError(`Invalid character in header ${part}: ${JSON.stringify(text)}`);
  }
  if (part === 'name' && (text.length === 0 || text.includes(':'))) {
    throw new TypeError(`Invalid header name: ${JSON.stringify(text)}`);
  }
}
