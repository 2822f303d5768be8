// handlers.ts - Request handlers for the profile routes

import { HTMLResponse } from "./html.ts";
import { profileDetail, profileEdit, profileEditForm, profileList } from "./render.ts";
import type { ProfileEditView } from "./render/pages.ts";
import { type ProfileRepository, isProfileOrder } from "./profiles.ts";
import { profileToValues, validateProfileForm } from "./forms.ts";
import { type AppConfig, USERNAME_PATTERN } from "./config.ts";
import type { HandlerId, UrlResolver } from "./routes.ts";
import { parseIntParam, redirect, type RouteHandler } from "./router.ts";
import { applySecurityHeaders, getRemoteUser, getRequestId, isAjax } from "./security.ts";
import { ForbiddenError, NotFoundError, ValidationError } from "./errors/types.ts";
import { log } from "./logger.ts";

const encoder = new TextEncoder();

export interface HandlerDeps {
  repository: ProfileRepository;
  config: AppConfig;
  urls: UrlResolver;
}

export type ProfileHandlers = Record<HandlerId, RouteHandler>;

// --- Utility functions ---

/**
 * Add Server-Timing header for performance monitoring.
 */
const addServerTiming = (response: Response, name: string, startTime: number, description?: string): void => {
  const duration = performance.now() - startTime;
  const value = description
    ? `${name};dur=${duration.toFixed(2)};desc="${description}"`
    : `${name};dur=${duration.toFixed(2)}`;
  const existing = response.headers.get("Server-Timing");
  response.headers.set("Server-Timing", existing ? `${existing}, ${value}` : value);
};

const computeCanonical = (request: Request, pathname: string): string =>
  new URL(pathname, request.url).toString();

export const generateETag = async (parts: Array<string | number | boolean | null>): Promise<string> => {
  const data = encoder.encode(parts.map((part) => String(part)).join("|"));
  const hash = await crypto.subtle.digest("SHA-1", data);
  const bytes = Array.from(new Uint8Array(hash));
  const hex = bytes.map((b) => b.toString(16).padStart(2, "0")).join("");
  return `"${hex}"`;
};

const etagMatches = (request: Request, etag: string): boolean => {
  const header = request.headers.get("If-None-Match");
  if (!header) return false;
  return header.split(",").some((candidate) => {
    const value = candidate.trim();
    return value === "*" || value === etag || value === `W/${etag}`;
  });
};

const loginRedirect = (request: Request, loginUrl: string): Response => {
  const url = new URL(request.url);
  const separator = loginUrl.includes("?") ? "&" : "?";
  return redirect(`${loginUrl}${separator}next=${encodeURIComponent(url.pathname + url.search)}`, 302);
};

// --- Route handlers ---

export function createHandlers({ repository, config, urls }: HandlerDeps): ProfileHandlers {
  // A remote user no account could have is treated as anonymous
  const viewerOf = (request: Request): string | null => {
    const viewer = getRemoteUser(request, config.remoteUserHeader);
    if (viewer !== null && !USERNAME_PATTERN.test(viewer)) {
      log.warn("Ignoring malformed remote user", { viewer, requestId: getRequestId(request) });
      return null;
    }
    return viewer;
  };

  /**
   * Profile list with username search, ordering and pagination.
   */
  const profiles: RouteHandler = async (request) => {
    const startTime = performance.now();
    const requestId = getRequestId(request);
    const url = new URL(request.url);
    const search = url.searchParams.get("search")?.trim() ?? "";
    const orderParam = url.searchParams.get("order") ?? "";
    const order = isProfileOrder(orderParam) ? orderParam : "date";

    const pageParam = url.searchParams.get("page");
    const page = pageParam === null ? 1 : parseIntParam(pageParam);
    if (page === null) {
      throw new NotFoundError("page", `invalid page ${pageParam}`, requestId);
    }

    const result = await repository.list({ search, order, page, perPage: config.profilesPerPage });
    if (page > result.totalPages) {
      throw new NotFoundError("page", `page ${page} of ${result.totalPages}`, requestId);
    }

    const response = new HTMLResponse(
      profileList({
        result,
        search,
        order,
        viewer: viewerOf(request),
        urls,
        canonicalUrl: computeCanonical(request, urls("profile_list")),
      }),
    );
    applySecurityHeaders(response.headers);
    addServerTiming(response, "total", startTime, "Total");
    return response;
  };

  /**
   * A single member's profile. Conditional requests are answered with 304.
   */
  const profile: RouteHandler = async (request, params) => {
    const startTime = performance.now();
    const requestId = getRequestId(request);
    const username = params.username ?? "";

    const account = await repository.findByUsername(username);
    if (!account) {
      throw new NotFoundError("profile", username, requestId);
    }

    const viewer = viewerOf(request);
    const isMe = viewer === account.username;
    const { name, about, location, website } = account.profile;
    const etag = await generateETag([account.username, name, about, location, website, isMe, viewer]);

    if (etagMatches(request, etag)) {
      return new Response(null, {
        status: 304,
        headers: applySecurityHeaders(new Headers({ ETag: etag })),
      });
    }

    const detailUrl = urls("profile_detail", { username: account.username });
    const response = new HTMLResponse(
      profileDetail({ account, isMe, viewer, urls, canonicalUrl: computeCanonical(request, detailUrl) }),
    );
    applySecurityHeaders(response.headers);
    response.headers.set("ETag", etag);
    response.headers.set("Vary", config.remoteUserHeader);
    addServerTiming(response, "total", startTime, "Total");
    return response;
  };

  /**
   * Edit the signed-in member's own profile.
   */
  const profileEditHandler: RouteHandler = async (request) => {
    const requestId = getRequestId(request);
    const viewer = viewerOf(request);
    if (!viewer) {
      return loginRedirect(request, config.loginUrl);
    }

    const account = await repository.findByUsername(viewer);
    if (!account) {
      throw new NotFoundError("profile", viewer, requestId);
    }

    let view: ProfileEditView = { values: profileToValues(account.profile), errors: {}, viewer, urls };

    if (request.method === "POST") {
      let form: FormData;
      try {
        form = await request.formData();
      } catch (e) {
        const contentType = request.headers.get("content-type");
        log.warn("Unreadable profile form", { contentType, requestId }, e instanceof Error ? e : undefined);
        throw new ValidationError("body", contentType, "The form submission could not be read.", requestId);
      }
      const result = validateProfileForm(form);
      if (result.ok) {
        await repository.updateProfile(viewer, result.profile);
        log.info("Profile updated", { username: viewer, requestId });
        return redirect(urls("profile_detail", { username: viewer }), 302);
      }
      log.debug("Profile form rejected", { username: viewer, fields: Object.keys(result.errors), requestId });
      view = { ...view, values: result.values, errors: result.errors };
    }

    const response = new HTMLResponse(isAjax(request) ? profileEditForm(view) : profileEdit(view));
    applySecurityHeaders(response.headers);
    response.headers.set("Cache-Control", "no-store");
    return response;
  };

  /**
   * Username completion for signed-in members: one
   * `username,,name,,location` line per match.
   */
  const usernameAutocompleteAll: RouteHandler = async (request) => {
    const requestId = getRequestId(request);
    if (!viewerOf(request)) {
      throw new ForbiddenError(undefined, requestId);
    }

    const prefix = new URL(request.url).searchParams.get("q")?.trim() ?? "";
    const accounts = await repository.autocomplete(prefix, config.autocompleteLimit);
    const body = accounts
      .map(({ username, profile }) => [username, profile.name ?? "", profile.location ?? ""].join(",,"))
      .join("\n");

    return new Response(body, {
      status: 200,
      headers: applySecurityHeaders(
        new Headers({
          "content-type": "text/plain; charset=utf-8",
          "Cache-Control": "no-store",
        }),
      ),
    });
  };

  return {
    profiles,
    profile,
    profileEdit: profileEditHandler,
    usernameAutocompleteAll,
  };
}
