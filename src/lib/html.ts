// html.ts - Escaping, streaming HTML templates and the HTML response type

type Primitive = string | number | boolean | null | undefined;

const RAW_HTML_SYMBOL = Symbol("RawHTML");

/**
 * Pre-escaped HTML that is emitted as-is when interpolated.
 */
export interface RawHTML {
  readonly [RAW_HTML_SYMBOL]: true;
  readonly __raw: string;
}

export const raw = (html: string): RawHTML => ({
  [RAW_HTML_SYMBOL]: true,
  __raw: html,
});

/**
 * A streamable HTML fragment.
 */
export interface HTML extends AsyncIterable<string> {}

export type HTMLValue =
  | Primitive
  | RawHTML
  | HTML
  | Promise<HTMLValue>
  | Iterable<HTMLValue>
  | AsyncIterable<HTMLValue>;

/**
 * Escape a value for HTML text and attribute positions.
 *
 * @example
 * ```ts
 * escape("<script>"); // "&lt;script&gt;"
 * escape(null); // ""
 * ```
 */
export const escape = (value: unknown): string => {
  if (value == null || value === false) return "";
  return String(value)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
};

const isRawHTML = (v: unknown): v is RawHTML =>
  typeof v === "object" && v !== null && RAW_HTML_SYMBOL in v;

const isAsyncIterable = (v: unknown): v is AsyncIterable<HTMLValue> =>
  typeof v === "object" && v !== null && Symbol.asyncIterator in v;

const isIterable = (v: unknown): v is Iterable<HTMLValue> =>
  typeof v === "object" && v !== null && Symbol.iterator in v;

const sharedEncoder = new TextEncoder();

export async function* flattenValue(value: HTMLValue): AsyncIterable<string> {
  if (value == null || value === false) return;

  if (value instanceof Promise) {
    yield* flattenValue(await value);
    return;
  }

  if (isRawHTML(value)) {
    yield value.__raw;
    return;
  }

  if (isAsyncIterable(value)) {
    for await (const v of value) {
      yield* flattenValue(v);
    }
    return;
  }

  if (isIterable(value)) {
    for (const v of value) {
      yield* flattenValue(v);
    }
    return;
  }

  yield escape(value);
}

/**
 * Remove the common leading indentation of a multi-line template,
 * along with a blank first and last line.
 */
export function dedent(str: string): string {
  const lines = str.split("\n");
  if (lines.length <= 1) return str;

  const startIndex = lines[0]?.trim() === "" ? 1 : 0;
  const endIndex = lines[lines.length - 1]?.trim() === "" ? lines.length - 1 : lines.length;
  const contentLines = lines.slice(startIndex, endIndex);
  if (contentLines.length === 0) return "";

  let minIndent = Infinity;
  for (const line of contentLines) {
    if (line.trim() === "") continue;
    const indent = line.length - line.trimStart().length;
    minIndent = Math.min(minIndent, indent);
  }

  if (minIndent === Infinity || minIndent === 0) {
    return contentLines.join("\n");
  }

  return contentLines
    .map((line) => (line.trim() === "" ? "" : line.slice(minIndent)))
    .join("\n");
}

/**
 * Tagged template producing streamable HTML. Interpolated values are escaped
 * unless they are `raw()` or nested templates.
 *
 * @example
 * ```ts
 * const items = ["a", "b"];
 * html`<ul>${items.map((i) => html`<li>${i}</li>`)}</ul>`;
 * ```
 */
export function html(strings: TemplateStringsArray, ...values: HTMLValue[]): HTML {
  return (async function* (): AsyncGenerator<string> {
    // Dedent with placeholders in place so interpolated content is untouched
    let fullString = "";
    for (let i = 0; i < strings.length; i++) {
      fullString += strings[i];
      if (i < values.length) fullString += `\x00${i}\x00`;
    }

    const dedented = dedent(fullString);

    let lastIndex = 0;
    for (let i = 0; i < values.length; i++) {
      const placeholder = `\x00${i}\x00`;
      const placeholderIndex = dedented.indexOf(placeholder, lastIndex);
      if (placeholderIndex === -1) continue;
      yield dedented.slice(lastIndex, placeholderIndex);
      yield* flattenValue(values[i]);
      lastIndex = placeholderIndex + placeholder.length;
    }
    yield dedented.slice(lastIndex);
  })();
}

export const htmlToString = async (fragment: HTML): Promise<string> => {
  let out = "";
  for await (const chunk of fragment) out += chunk;
  return out;
};

export function htmlToStream(
  fragment: HTML,
  encoder: TextEncoder = sharedEncoder,
): ReadableStream<Uint8Array> {
  const iterator = fragment[Symbol.asyncIterator]();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { value, done } = await iterator.next();
        if (done) {
          controller.close();
          return;
        }
        controller.enqueue(encoder.encode(value));
      } catch (e) {
        controller.error(e);
      }
    },

    async cancel() {
      await iterator.return?.();
    },
  });
}

export class HTMLResponse extends Response {
  constructor(body: HTML | string, init?: ResponseInit) {
    const headers = new Headers(init?.headers);
    if (!headers.has("content-type")) {
      headers.set("content-type", "text/html; charset=utf-8");
    }

    super(typeof body === "string" ? body : htmlToStream(body), { ...init, headers });
  }
}
