// router.ts - Declarative routing with named routes and reverse lookup

import { NoReverseMatchError, MethodNotAllowedError, RouteConfigurationError } from "./errors/types.ts";
import { applySecurityHeaders } from "./security.ts";

export type HttpMethod = "GET" | "HEAD" | "POST" | "PUT" | "PATCH" | "DELETE";

export type RouteParams = Record<string, string>;

export type RouteHandler = (
  request: Request,
  params: RouteParams,
) => Response | Promise<Response>;

export type ErrorHandler = (error: unknown, request: Request) => Response | Promise<Response>;

export interface Route<Name extends string = string> {
  /** Symbolic name used for reverse lookup; unique per router */
  name: Name;
  /** Anchored pattern matched against the decoded path below the prefix */
  pattern: RegExp;
  /** Reverse template, `:param` segments substituted by `reverse()` */
  path: string;
  methods: readonly HttpMethod[];
  handler: RouteHandler;
}

export interface RouteMatch<Name extends string = string> {
  route: Route<Name>;
  params: RouteParams;
}

export interface RouterOptions {
  /** Mount prefix, with leading and trailing slash */
  prefix?: string;
  appendSlash?: boolean;
}

const PARAM_SEGMENT = /:([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Create a redirect response with security headers applied.
 */
export function redirect(location: string, status: 301 | 302 | 303 | 307 | 308 = 301): Response {
  return new Response(null, {
    status,
    headers: applySecurityHeaders(new Headers({ Location: location })),
  });
}

// HEAD is served wherever GET is
const allowedMethods = (route: Route): HttpMethod[] =>
  route.methods.flatMap((method): HttpMethod[] =>
    method === "GET" && !route.methods.includes("HEAD") ? ["GET", "HEAD"] : [method]
  );

const allows = (route: Route, method: string): boolean =>
  allowedMethods(route).some((allowed) => allowed === method);

const decodePath = (path: string): string | null => {
  try {
    return decodeURIComponent(path);
  } catch {
    return null;
  }
};

const groupsOf = (match: RegExpExecArray): RouteParams => {
  const params: RouteParams = {};
  for (const [key, value] of Object.entries(match.groups ?? {})) {
    if (value !== undefined) params[key] = value;
  }
  return params;
};

/**
 * Router matching requests against routes in declaration order.
 * The first route whose pattern matches wins. Once the router has handled
 * a request (or `seal()` was called) the table can no longer change.
 */
export class Router<Name extends string = string> {
  private readonly routeList: Route<Name>[] = [];
  private readonly byName = new Map<Name, Route<Name>>();
  private notFoundHandler: RouteHandler | null = null;
  private errorHandler: ErrorHandler | null = null;
  private sealed = false;

  readonly prefix: string;
  readonly appendSlash: boolean;

  constructor(options: RouterOptions = {}) {
    this.prefix = options.prefix ?? "/";
    this.appendSlash = options.appendSlash ?? true;
    if (!this.prefix.startsWith("/") || !this.prefix.endsWith("/")) {
      throw new RouteConfigurationError(`Mount prefix must start and end with "/": ${this.prefix}`);
    }
  }

  get routes(): readonly Route<Name>[] {
    return this.routeList;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  add(route: Route<Name>): this {
    if (this.sealed) {
      throw new RouteConfigurationError(`Cannot add route "${route.name}" after the router is sealed`);
    }
    if (this.byName.has(route.name)) {
      throw new RouteConfigurationError(`Duplicate route name "${route.name}"`);
    }
    this.routeList.push(route);
    this.byName.set(route.name, route);
    return this;
  }

  addAll(routes: readonly Route<Name>[]): this {
    for (const route of routes) this.add(route);
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  onNotFound(handler: RouteHandler): this {
    this.notFoundHandler = handler;
    return this;
  }

  onError(handler: ErrorHandler): this {
    this.errorHandler = handler;
    return this;
  }

  /**
   * Find the first route matching an absolute request path.
   */
  resolve(pathname: string): RouteMatch<Name> | null {
    if (!pathname.startsWith(this.prefix)) return null;
    const relative = decodePath(pathname.slice(this.prefix.length));
    if (relative === null) return null;

    for (const route of this.routeList) {
      const match = route.pattern.exec(relative);
      if (match) return { route, params: groupsOf(match) };
    }
    return null;
  }

  /**
   * Build the absolute path for a named route.
   *
   * @throws NoReverseMatchError for an unknown name, missing or extra
   * parameters, or values the route's pattern would reject.
   */
  reverse(name: Name, params: RouteParams = {}): string {
    const route = this.byName.get(name);
    if (!route) throw new NoReverseMatchError(name, "no route with that name");

    const expected = new Set([...route.path.matchAll(PARAM_SEGMENT)].map((m) => m[1]));
    for (const key of Object.keys(params)) {
      if (!expected.has(key)) throw new NoReverseMatchError(name, `unexpected parameter "${key}"`);
    }

    const missing = [...expected].find((key) => params[key] === undefined);
    if (missing !== undefined) throw new NoReverseMatchError(name, `missing parameter "${missing}"`);

    const fill = (encode: (value: string) => string): string =>
      route.path.replace(PARAM_SEGMENT, (_, key: string) => encode(params[key] ?? ""));

    const decoded = fill((value) => value);
    if (!route.pattern.test(decoded)) {
      throw new NoReverseMatchError(name, `parameters ${JSON.stringify(params)} do not match the pattern`);
    }

    return this.prefix + fill(encodeURIComponent);
  }

  async handle(request: Request): Promise<Response> {
    this.sealed = true;
    const url = new URL(request.url);

    try {
      const match = this.resolve(url.pathname);
      if (match) {
        const { route, params } = match;
        if (!allows(route, request.method)) {
          throw new MethodNotAllowedError(request.method, allowedMethods(route));
        }
        const response = await route.handler(request, params);
        if (request.method === "HEAD") {
          return new Response(null, { status: response.status, headers: response.headers });
        }
        return response;
      }

      if (
        this.appendSlash &&
        !url.pathname.endsWith("/") &&
        (request.method === "GET" || request.method === "HEAD") &&
        this.resolve(`${url.pathname}/`)
      ) {
        return redirect(`${url.pathname}/${url.search}`, 301);
      }

      if (this.notFoundHandler) {
        return await this.notFoundHandler(request, {});
      }

      return new Response("Not Found", { status: 404 });
    } catch (error) {
      if (this.errorHandler) {
        return await this.errorHandler(error, request);
      }
      throw error;
    }
  }
}

/**
 * Parse a parameter as a positive integer.
 * Returns null if invalid.
 */
export function parseIntParam(value: string | null | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const num = Number.parseInt(value, 10);
  if (!Number.isFinite(num) || num < 1) return null;
  return num;
}
