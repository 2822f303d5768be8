// index.ts - Public entry points

export { createApp, type AppOptions, type ProfilesApp } from "./lib/handler.ts";
export { type Route, type RouteHandler, type RouteMatch, type RouteParams, Router } from "./lib/router.ts";
export { PROFILE_ROUTES, type RouteDefinition, type RouteName } from "./lib/routes.ts";
export {
  type Account,
  InMemoryProfileRepository,
  loadSeedFile,
  type Profile,
  type ProfileRepository,
} from "./lib/profiles.ts";
export { type AppConfig, DEFAULT_CONFIG, loadConfig, type ServerConfig } from "./lib/config.ts";
export * from "./lib/errors/types.ts";
