import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { DecodeError, UnsupportedContentTypeError } from './errors';
import type { DecodeTarget, HttpHeaders } from './types';

/**
 * Holds the value decoded from a response body. Pass it to a request and
 * read `value` after the request was sent.
 *
 * @example
 * ```typescript
 * const todo = decodeInto(z.object({ id: z.number(), title: z.string() }));
 * await newRequest().setURL(url).setWantedResponseBody(todo).send(client);
 * console.log(todo.value?.title);
 * ```
 */
export class ResponseTarget<T = unknown> implements DecodeTarget {
  value: T | undefined;

  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  decode(input: unknown): void {
    this.value = this.schema.parse(input);
  }

  reset(): void {
    this.value = undefined;
  }
}

export const decodeInto = <T>(schema: ZodType<T, ZodTypeDef, unknown>): ResponseTarget<T> =>
  new ResponseTarget(schema);

/** Shape of the default error target: a single `error` field. */
export const errorBodySchema = z.object({
  error: z.string().default(''),
});

export type ErrorBody = z.infer<typeof errorBodySchema>;

export const JSON_CONTENT_TYPE = 'application/json';
export const XML_CONTENT_TYPE = 'application/xml';

const textDecoder = new TextDecoder();

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: 'value',
  parseTagValue: false,
  ignoreDeclaration: true,
});

/**
 * Returns the media type of a Content-Type header, lower-cased and without
 * parameters: `Application/JSON; charset=utf-8` gives `application/json`.
 */
export function mediaType(headers: HttpHeaders): string | undefined {
  const entry = Object.entries(headers).find(([key]) => key.toLowerCase() === 'content-type');
  if (!entry) return undefined;
  const [type] = entry[1].split(';');
  return type.trim().toLowerCase() || undefined;
}

// XML documents decode to their root element's content, so
// <struct><key>value</key></struct> gives { key: 'value' }.
function unwrapRoot(parsed: unknown): unknown {
  if (typeof parsed !== 'object' || parsed === null) return parsed;
  const keys = Object.keys(parsed);
  if (keys.length !== 1) return parsed;
  return Object.values(parsed)[0];
}

function parseBody(contentType: string, text: string): unknown {
  if (contentType === JSON_CONTENT_TYPE) {
    return JSON.parse(text);
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new SyntaxError(`${msg} (line ${line}, column ${col})`);
  }
  return unwrapRoot(xmlParser.parse(text));
}

/**
 * Decodes a response body into `target`, choosing the format from the
 * response's Content-Type.
 *
 * @throws UnsupportedContentTypeError when the content type is neither JSON nor XML
 * @throws DecodeError when the body does not parse or does not match the target
 */
export function decodeResponse(
  response: { status: number; headers: HttpHeaders; body: Uint8Array },
  target: DecodeTarget,
): void {
  const contentType = mediaType(response.headers);
  if (contentType !== JSON_CONTENT_TYPE && contentType !== XML_CONTENT_TYPE) {
    throw new UnsupportedContentTypeError({
      status: response.status,
      body: response.body,
      contentType,
    });
  }

  try {
    target.decode(parseBody(contentType, textDecoder.decode(response.body)));
  } catch (error) {
    throw new DecodeError({ status: response.status, body: response.body, cause: error });
  }
}
