// routes.ts - The profile URL table, shared by the app and tests

import type { HttpMethod } from "./router.ts";

export type RouteName =
  | "profile_username_autocomplete"
  | "profile_list"
  | "profile_detail"
  | "profile_edit";

export type HandlerId = "usernameAutocompleteAll" | "profiles" | "profile" | "profileEdit";

export interface RouteDefinition {
  name: RouteName;
  /** Matched against the decoded path below the mount prefix */
  pattern: RegExp;
  path: string;
  handler: HandlerId;
  methods: readonly HttpMethod[];
}

/**
 * Route parameter types for parameterized routes.
 */
export type ProfileDetailParams = {
  username: string;
};

/**
 * Profile routes in match order; the first matching pattern wins.
 * A friends-only username autocomplete is not routed: every member is
 * searchable.
 */
export const PROFILE_ROUTES: readonly RouteDefinition[] = [
  {
    name: "profile_username_autocomplete",
    pattern: /^username_autocomplete\/$/,
    path: "username_autocomplete/",
    handler: "usernameAutocompleteAll",
    methods: ["GET"],
  },
  {
    name: "profile_list",
    pattern: /^$/,
    path: "",
    handler: "profiles",
    methods: ["GET"],
  },
  {
    name: "profile_detail",
    pattern: /^profile\/(?<username>[\p{L}\p{N}_.-]+)\/$/u,
    path: "profile/:username/",
    handler: "profile",
    methods: ["GET"],
  },
  {
    name: "profile_edit",
    pattern: /^edit\/$/,
    path: "edit/",
    handler: "profileEdit",
    methods: ["GET", "POST"],
  },
];

/**
 * Build URLs for named routes; `reverse` on the app router satisfies this.
 */
export interface UrlResolver {
  (name: "profile_detail", params: ProfileDetailParams): string;
  (name: Exclude<RouteName, "profile_detail">): string;
}
