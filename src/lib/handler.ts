// handler.ts - Builds the profile application around the route table

import { type AppConfig, DEFAULT_CONFIG } from "./config.ts";
import { type ProfileRepository, InMemoryProfileRepository } from "./profiles.ts";
import { PROFILE_ROUTES, type RouteName, type UrlResolver } from "./routes.ts";
import { type RouteParams, Router } from "./router.ts";
import { createHandlers } from "./handlers.ts";
import { renderError } from "./errors.ts";
import { NotFoundError, toProfilesError } from "./errors/types.ts";
import { getRequestId } from "./security.ts";
import { log } from "./logger.ts";

export interface AppOptions {
  repository?: ProfileRepository;
  config?: Partial<AppConfig>;
}

export interface ProfilesApp {
  router: Router<RouteName>;
  repository: ProfileRepository;
  config: AppConfig;
  handle(request: Request): Promise<Response>;
}

export function createApp(options: AppOptions = {}): ProfilesApp {
  const config: AppConfig = { ...DEFAULT_CONFIG, ...options.config };
  const repository = options.repository ?? new InMemoryProfileRepository();
  const router = new Router<RouteName>({ prefix: config.mountPrefix, appendSlash: config.appendSlash });

  const urls: UrlResolver = (name: RouteName, params?: RouteParams) => router.reverse(name, params);
  const handlers = createHandlers({ repository, config, urls });

  router
    .addAll(PROFILE_ROUTES.map(({ handler, ...definition }) => ({ ...definition, handler: handlers[handler] })))
    .onNotFound((request) => {
      throw new NotFoundError("page", new URL(request.url).pathname, getRequestId(request));
    })
    .onError((error, request) => {
      const requestId = getRequestId(request);
      const appError = toProfilesError(error, requestId);
      if (appError.statusCode >= 500) {
        log.error(
          "Unhandled error in request handler",
          { requestId, url: request.url },
          error instanceof Error ? error : undefined,
        );
      }
      return renderError(appError, requestId, router.reverse("profile_list"));
    })
    .seal();

  const handle = async (request: Request): Promise<Response> => {
    const startTime = performance.now();
    const response = await router.handle(request);
    log.info("Request handled", {
      requestId: getRequestId(request),
      method: request.method,
      path: new URL(request.url).pathname,
      status: response.status,
      durationMs: Number((performance.now() - startTime).toFixed(2)),
    });
    return response;
  };

  return { router, repository, config, handle };
}
