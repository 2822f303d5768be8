// errors.ts - Error page rendering

import { escape, HTMLResponse } from "./html.ts";
import { applySecurityHeaders } from "./security.ts";
import { MethodNotAllowedError, type ProfilesError } from "./errors/types.ts";

const errorPageStyles = `
  body {
    font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Helvetica, Arial, sans-serif;
    background-color: whitesmoke;
    margin: 40px auto;
    max-width: 600px;
    line-height: 1.6;
    font-size: 18px;
    padding: 0 1em;
    color: #333;
    text-align: center;
  }
  .meta-note {
    font-size: 0.9em;
    opacity: 0.7;
  }
  h1 { margin-bottom: 0.2em; }
  p { margin-top: 0; }
  a {
    color: inherit;
    text-decoration: none;
    border-bottom: 1px solid rgba(0,0,0,0.2);
  }
`;

export const renderErrorPage = (
  status: number,
  title: string,
  description: string,
  requestId?: string,
  homeUrl = "/",
): Response => {
  const now = new Date();
  const id = requestId ?? crypto.randomUUID();

  const headers = applySecurityHeaders(new Headers());
  headers.set("Cache-Control", "no-store");

  return new HTMLResponse(
    `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${escape(title)} | Profiles</title>
    <style>${errorPageStyles}</style>
  </head>
  <body>
    <main aria-live="polite">
      <h1>${escape(title)}</h1>
      <p>${escape(description)}</p>
      <p><a href="${escape(homeUrl)}">Back to profiles</a></p>
      <p class="meta-note">Request ID: ${escape(id)}<br/>${escape(now.toUTCString())}</p>
    </main>
  </body>
</html>`,
    { status, headers },
  );
};

/**
 * Render an application error, adding the Allow header for 405s.
 */
export const renderError = (error: ProfilesError, requestId?: string, homeUrl?: string): Response => {
  const response = renderErrorPage(
    error.statusCode,
    error.title,
    error.description,
    error.requestId ?? requestId,
    homeUrl,
  );
  if (error instanceof MethodNotAllowedError) {
    response.headers.set("Allow", error.allowed.join(", "));
  }
  return response;
};
