// handler_test.ts - End-to-end tests of the profile app against an in-memory store

import { test } from "node:test";
import assert from "node:assert/strict";

import { createApp, type ProfilesApp } from "../src/lib/handler.ts";
import { type Account, InMemoryProfileRepository, type ProfileRepository } from "../src/lib/profiles.ts";
import type { AppConfig } from "../src/lib/config.ts";
import { setLogLevel } from "../src/lib/logger.ts";

setLogLevel("error");

const ACCOUNTS: Account[] = [
  {
    username: "alice",
    dateJoined: new Date("2024-01-15T09:30:00Z"),
    profile: {
      name: "Alice Example",
      about: "Gardening & small web apps",
      location: "Lisbon",
      website: "https://alice.example.org/",
    },
  },
  {
    username: "bob.smith",
    dateJoined: new Date("2024-03-02T17:05:00Z"),
    profile: { name: "Bob Smith", about: null, location: "Leeds", website: null },
  },
  {
    username: "carol-d",
    dateJoined: new Date("2024-06-21T12:00:00Z"),
    profile: { name: null, about: null, location: null, website: null },
  },
  {
    username: "dave_99",
    dateJoined: new Date("2023-11-05T08:00:00Z"),
    profile: { name: null, about: null, location: "Oslo", website: null },
  },
];

function createTestApp(config: Partial<AppConfig> = {}): ProfilesApp {
  return createApp({ repository: new InMemoryProfileRepository(ACCOUNTS), config });
}

const get = (app: ProfilesApp, path: string, headers: Record<string, string> = {}): Promise<Response> =>
  app.handle(new Request(`http://localhost${path}`, { headers }));

const post = (
  app: ProfilesApp,
  path: string,
  body: BodyInit,
  headers: Record<string, string> = {},
): Promise<Response> => app.handle(new Request(`http://localhost${path}`, { method: "POST", body, headers }));

const asUser = (username: string): Record<string, string> => ({ "x-remote-user": username });

const positions = (body: string, usernames: string[]): number[] =>
  usernames.map((username) => body.indexOf(`>${username}</a>`));

const isAscending = (values: number[]): boolean =>
  values.every((value, i) => value >= 0 && (i === 0 || value > (values[i - 1] ?? -1)));

// =============================================================================
// Profile list
// =============================================================================

test("profile list: renders every member, newest first", async () => {
  const response = await get(createTestApp(), "/profiles/");
  assert.equal(response.status, 200);
  assert.equal(response.headers.get("content-type"), "text/html; charset=utf-8");

  const body = await response.text();
  assert.ok(body.includes(`<a href="/profiles/profile/carol-d/">carol-d</a>`));
  assert.ok(isAscending(positions(body, ["carol-d", "bob.smith", "alice", "dave_99"])));
});

test("profile list: orders by name", async () => {
  const body = await (await get(createTestApp(), "/profiles/?order=name")).text();
  assert.ok(isAscending(positions(body, ["alice", "bob.smith", "carol-d", "dave_99"])));
});

test("profile list: unknown order falls back to newest first", async () => {
  const body = await (await get(createTestApp(), "/profiles/?order=bogus")).text();
  assert.ok(isAscending(positions(body, ["carol-d", "bob.smith", "alice", "dave_99"])));
});

test("profile list: searches usernames case-insensitively", async () => {
  const body = await (await get(createTestApp(), "/profiles/?search=O")).text();
  assert.ok(body.includes(">bob.smith</a>"));
  assert.ok(body.includes(">carol-d</a>"));
  assert.ok(!body.includes(">alice</a>"));
  assert.ok(!body.includes(">dave_99</a>"));
});

test("profile list: empty search result", async () => {
  const body = await (await get(createTestApp(), "/profiles/?search=zzz")).text();
  assert.ok(body.includes(`<p class="empty">No profiles found.</p>`));
});

test("profile list: signed-in member with a non-ASCII username", async () => {
  const response = await get(createTestApp(), "/profiles/", asUser("jörg"));
  assert.equal(response.status, 200);
  assert.ok((await response.text()).includes(`<a href="/profiles/profile/j%C3%B6rg/">My profile</a>`));
});

test("profile list: remote user no account could have is anonymous", async () => {
  const response = await get(createTestApp(), "/profiles/", asUser("john doe"));
  assert.equal(response.status, 200);
  assert.ok(!(await response.text()).includes("My profile"));
});

test("profile list: paginates", async () => {
  const app = createTestApp({ profilesPerPage: 2 });
  const response = await get(app, "/profiles/?order=name&page=2");
  assert.equal(response.status, 200);

  const body = await response.text();
  assert.ok(body.includes("<span>Page 2 of 2</span>"));
  assert.ok(body.includes(">carol-d</a>"));
  assert.ok(body.includes(">dave_99</a>"));
  assert.ok(!body.includes(">alice</a>"));
});

test("profile list: page past the end is not found", async () => {
  const response = await get(createTestApp({ profilesPerPage: 2 }), "/profiles/?page=3");
  assert.equal(response.status, 404);
  assert.ok((await response.text()).includes("Page not found"));
});

test("profile list: invalid page numbers are not found", async () => {
  const app = createTestApp();
  for (const page of ["0", "-1", "abc"]) {
    const response = await get(app, `/profiles/?page=${page}`);
    assert.equal(response.status, 404, page);
  }
});

test("profile list: HEAD has no body", async () => {
  const response = await createTestApp().handle(new Request("http://localhost/profiles/", { method: "HEAD" }));
  assert.equal(response.status, 200);
  assert.equal(await response.text(), "");
});

test("profile list: applies security headers", async () => {
  const response = await get(createTestApp(), "/profiles/");
  assert.equal(response.headers.get("X-Content-Type-Options"), "nosniff");
  assert.ok(response.headers.get("Content-Security-Policy")?.includes("form-action 'self'"));
});

// =============================================================================
// Profile detail
// =============================================================================

test("profile detail: renders the member's profile", async () => {
  const response = await get(createTestApp(), "/profiles/profile/alice/");
  assert.equal(response.status, 200);

  const body = await response.text();
  assert.ok(body.includes("<h1>Alice Example</h1>"));
  assert.ok(body.includes("<dt>Location</dt><dd>Lisbon</dd>"));
  assert.ok(body.includes(`<a href="https://alice.example.org/" rel="nofollow noopener">https://alice.example.org/</a>`));
  assert.ok(body.includes("<p>Gardening &amp; small web apps</p>"));
  assert.ok(body.includes(`<link rel="canonical" href="http://localhost/profiles/profile/alice/">`));
  assert.ok(!body.includes(`class="is-me"`));
});

test("profile detail: falls back to the username as heading", async () => {
  const body = await (await get(createTestApp(), "/profiles/profile/carol-d/")).text();
  assert.ok(body.includes("<h1>carol-d</h1>"));
});

test("profile detail: offers an edit link on your own profile", async () => {
  const body = await (await get(createTestApp(), "/profiles/profile/alice/", asUser("alice"))).text();
  assert.ok(body.includes(`<p class="is-me"><a href="/profiles/edit/">Edit your profile</a></p>`));
});

test("profile detail: no edit link on someone else's profile", async () => {
  const body = await (await get(createTestApp(), "/profiles/profile/alice/", asUser("bob.smith"))).text();
  assert.ok(!body.includes(`class="is-me"`));
});

test("profile detail: unknown member is not found", async () => {
  const response = await get(createTestApp(), "/profiles/profile/nobody/");
  assert.equal(response.status, 404);
  assert.equal(response.headers.get("Cache-Control"), "no-store");
  assert.ok((await response.text()).includes("Profile not found"));
});

test("profile detail: usernames are case-sensitive", async () => {
  const response = await get(createTestApp(), "/profiles/profile/Alice/");
  assert.equal(response.status, 404);
});

test("profile detail: invalid username characters are not routed", async () => {
  const response = await get(createTestApp(), "/profiles/profile/bad%20name/");
  assert.equal(response.status, 404);
  assert.ok((await response.text()).includes("Page not found"));
});

test("profile detail: non-ASCII usernames", async () => {
  const repository = new InMemoryProfileRepository([
    {
      username: "josé",
      dateJoined: new Date("2024-02-01T00:00:00Z"),
      profile: { name: null, about: "Line one\nLine two", location: null, website: null },
    },
  ]);
  const response = await get(createApp({ repository }), "/profiles/profile/jos%C3%A9/");
  assert.equal(response.status, 200);

  const body = await response.text();
  assert.ok(body.includes("<h1>josé</h1>"));
  assert.ok(body.includes("<p>Line one<br>Line two</p>"));
});

test("profile detail: escapes profile fields", async () => {
  const repository = new InMemoryProfileRepository([
    {
      username: "eve",
      dateJoined: new Date("2024-02-01T00:00:00Z"),
      profile: { name: "<b>Eve</b>", about: null, location: null, website: null },
    },
  ]);
  const app = createApp({ repository });
  const body = await (await get(app, "/profiles/profile/eve/")).text();
  assert.ok(body.includes("<h1>&lt;b&gt;Eve&lt;/b&gt;</h1>"));
});

test("profile detail: answers a matching If-None-Match with 304", async () => {
  const app = createTestApp();
  const first = await get(app, "/profiles/profile/alice/");
  const etag = first.headers.get("ETag");
  assert.ok(etag);
  await first.text();

  const second = await get(app, "/profiles/profile/alice/", { "If-None-Match": etag });
  assert.equal(second.status, 304);
  assert.equal(second.headers.get("ETag"), etag);
});

test("profile detail: ETag differs for the profile owner", async () => {
  const app = createTestApp();
  const anonymous = await get(app, "/profiles/profile/alice/");
  const owner = await get(app, "/profiles/profile/alice/", asUser("alice"));
  assert.notEqual(anonymous.headers.get("ETag"), owner.headers.get("ETag"));
});

test("profile detail: redirects to the slashed path", async () => {
  const response = await get(createTestApp(), "/profiles/profile/alice");
  assert.equal(response.status, 301);
  assert.equal(response.headers.get("Location"), "/profiles/profile/alice/");
});

// =============================================================================
// Profile edit
// =============================================================================

test("profile edit: anonymous users are sent to log in", async () => {
  const response = await get(createTestApp(), "/profiles/edit/");
  assert.equal(response.status, 302);
  assert.equal(response.headers.get("Location"), "/account/login/?next=%2Fprofiles%2Fedit%2F");
});

test("profile edit: login URL is configurable", async () => {
  const response = await get(createTestApp({ loginUrl: "/login?source=profiles" }), "/profiles/edit/");
  assert.equal(response.headers.get("Location"), "/login?source=profiles&next=%2Fprofiles%2Fedit%2F");
});

test("profile edit: renders the form with current values", async () => {
  const response = await get(createTestApp(), "/profiles/edit/", asUser("alice"));
  assert.equal(response.status, 200);
  assert.equal(response.headers.get("Cache-Control"), "no-store");

  const body = await response.text();
  assert.ok(body.startsWith("<!DOCTYPE html>"));
  assert.ok(body.includes(`<input id="id_name" type="text" name="name" value="Alice Example">`));
  assert.ok(body.includes(`<input id="id_location" type="text" name="location" value="Lisbon">`));
  assert.ok(body.includes(`<textarea id="id_about" name="about" rows="6">Gardening &amp; small web apps</textarea>`));
});

test("profile edit: XMLHttpRequest callers get only the form", async () => {
  const response = await get(createTestApp(), "/profiles/edit/", {
    ...asUser("alice"),
    "X-Requested-With": "XMLHttpRequest",
  });
  const body = await response.text();
  assert.ok(body.startsWith(`<form method="post" action="/profiles/edit/" class="profile-edit">`));
  assert.ok(!body.includes("<!DOCTYPE html>"));
});

test("profile edit: saves a valid form and redirects to the profile", async () => {
  const app = createTestApp();
  const form = new URLSearchParams({ name: "Alice B", about: "", location: "  Porto ", website: "alice.dev" });
  const response = await post(app, "/profiles/edit/", form, asUser("alice"));

  assert.equal(response.status, 302);
  assert.equal(response.headers.get("Location"), "/profiles/profile/alice/");

  const account = await app.repository.findByUsername("alice");
  assert.deepEqual(account?.profile, {
    name: "Alice B",
    about: null,
    location: "Porto",
    website: "http://alice.dev/",
  });
});

test("profile edit: re-renders an invalid form with errors", async () => {
  const app = createTestApp();
  const form = new URLSearchParams({ name: "Alice", location: "x".repeat(41), website: "ftp://files.example.com" });
  const response = await post(app, "/profiles/edit/", form, asUser("alice"));

  assert.equal(response.status, 200);
  const body = await response.text();
  assert.ok(body.includes(`<ul class="errorlist"><li>Ensure this value has at most 40 characters.</li></ul>`));
  assert.ok(body.includes(`<ul class="errorlist"><li>Enter a valid URL.</li></ul>`));
  assert.ok(body.includes(`value="ftp://files.example.com"`));

  const account = await app.repository.findByUsername("alice");
  assert.equal(account?.profile.location, "Lisbon");
});

test("profile edit: unreadable body is a bad request", async () => {
  const response = await post(createTestApp(), "/profiles/edit/", JSON.stringify({ name: "x" }), {
    ...asUser("alice"),
    "content-type": "application/json",
  });
  assert.equal(response.status, 400);
  assert.ok((await response.text()).includes("The form submission could not be read."));
});

test("profile edit: signed-in user without an account is not found", async () => {
  const response = await get(createTestApp(), "/profiles/edit/", asUser("mallory"));
  assert.equal(response.status, 404);
});

test("profile edit: other methods are not allowed", async () => {
  const response = await createTestApp().handle(
    new Request("http://localhost/profiles/edit/", { method: "DELETE", headers: asUser("alice") }),
  );
  assert.equal(response.status, 405);
  assert.equal(response.headers.get("Allow"), "GET, HEAD, POST");
});

// =============================================================================
// Username autocomplete
// =============================================================================

test("autocomplete: anonymous users are forbidden", async () => {
  const response = await get(createTestApp(), "/profiles/username_autocomplete/?q=a");
  assert.equal(response.status, 403);
});

test("autocomplete: matches username prefixes", async () => {
  const response = await get(createTestApp(), "/profiles/username_autocomplete/?q=b", asUser("alice"));
  assert.equal(response.status, 200);
  assert.equal(response.headers.get("content-type"), "text/plain; charset=utf-8");
  assert.equal(await response.text(), "bob.smith,,Bob Smith,,Leeds");
});

test("autocomplete: prefix match ignores case", async () => {
  const response = await get(createTestApp(), "/profiles/username_autocomplete/?q=D", asUser("alice"));
  assert.equal(await response.text(), "dave_99,,,,Oslo");
});

test("autocomplete: without a query lists members up to the limit", async () => {
  const response = await get(
    createTestApp({ autocompleteLimit: 2 }),
    "/profiles/username_autocomplete/",
    asUser("alice"),
  );
  assert.equal(await response.text(), "alice,,Alice Example,,Lisbon\nbob.smith,,Bob Smith,,Leeds");
});

test("autocomplete: no matches gives an empty body", async () => {
  const response = await get(createTestApp(), "/profiles/username_autocomplete/?q=zzz", asUser("alice"));
  assert.equal(response.status, 200);
  assert.equal(await response.text(), "");
});

test("autocomplete: POST is not allowed", async () => {
  const response = await post(createTestApp(), "/profiles/username_autocomplete/", "", asUser("alice"));
  assert.equal(response.status, 405);
  assert.equal(response.headers.get("Allow"), "GET, HEAD");
});

// =============================================================================
// Fallbacks and failures
// =============================================================================

test("app: unknown paths below the prefix are not found", async () => {
  const response = await get(createTestApp(), "/profiles/nope/");
  assert.equal(response.status, 404);
  assert.ok((await response.text()).includes(`<a href="/profiles/">Back to profiles</a>`));
});

test("app: paths outside the prefix are not found", async () => {
  const response = await get(createTestApp(), "/elsewhere");
  assert.equal(response.status, 404);
});

test("app: repository failures render a 500 page", async (t) => {
  t.mock.method(console, "error", () => {});
  const failing: ProfileRepository = {
    list: () => Promise.reject(new Error("store offline")),
    findByUsername: () => Promise.reject(new Error("store offline")),
    updateProfile: () => Promise.reject(new Error("store offline")),
    autocomplete: () => Promise.reject(new Error("store offline")),
  };
  const app = createApp({ repository: failing });

  const response = await get(app, "/profiles/profile/alice/", { "x-request-id": "req-123" });
  assert.equal(response.status, 500);
  const body = await response.text();
  assert.ok(body.includes("<h1>Something went wrong</h1>"));
  assert.ok(body.includes("Request ID: req-123"));
});
