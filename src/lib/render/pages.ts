// render/pages.ts - Full page templates

import { type HTML, html as tpl } from "../html.ts";
import type { Account, ProfilePage, ProfileOrder } from "../profiles.ts";
import { type FormErrors, type FormValues, PROFILE_FIELDS } from "../forms.ts";
import type { UrlResolver } from "../routes.ts";
import { formField, headerBar, linebreaks, orderLinks, pagination, profileSummary, sharedStyles } from "./components.ts";

const shellPage = (
  title: string,
  body: HTML,
  canonicalUrl?: string,
): HTML =>
  tpl`
<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    ${canonicalUrl ? tpl`<link rel="canonical" href="${canonicalUrl}">` : ""}
    ${sharedStyles()}
    <title>${title}</title>
  </head>
  <body>
    ${body}
  </body>
</html>`;

// --- Profile list ---

export interface ProfileListView {
  result: ProfilePage;
  search: string;
  order: ProfileOrder;
  viewer: string | null;
  urls: UrlResolver;
  canonicalUrl?: string;
}

export const profileList = ({ result, search, order, viewer, urls, canonicalUrl }: ProfileListView): HTML => {
  const listUrl = urls("profile_list");
  return shellPage(
    "Profiles",
    tpl`
      ${headerBar(urls, viewer)}
      <main id="main-content">
        <h1>Profiles</h1>
        <form method="get" action="${listUrl}" role="search">
          <input type="search" name="search" value="${search}" aria-label="Search usernames">
          <input type="hidden" name="order" value="${order}">
          <button type="submit">Search</button>
        </form>
        ${orderLinks(listUrl, search, order)}
        ${
      result.accounts.length
        ? tpl`<ol class="profiles" start="${(result.page - 1) * result.perPage + 1}">
          ${result.accounts.map((account) => profileSummary(account, urls))}
        </ol>`
        : tpl`<p class="empty">No profiles found.</p>`
    }
        ${pagination(listUrl, search, order, result.page, result.totalPages)}
      </main>
    `,
    canonicalUrl,
  );
};

// --- Profile detail ---

export interface ProfileDetailView {
  account: Account;
  isMe: boolean;
  viewer: string | null;
  urls: UrlResolver;
  canonicalUrl?: string;
}

export const profileDetail = ({ account, isMe, viewer, urls, canonicalUrl }: ProfileDetailView): HTML => {
  const { profile } = account;
  return shellPage(
    `Profile: ${account.username}`,
    tpl`
      ${headerBar(urls, viewer)}
      <main id="main-content">
        <article class="profile">
          <h1>${profile.name ?? account.username}</h1>
          <p class="profile-meta">@${account.username} &middot; joined ${account.dateJoined.toISOString().slice(0, 10)}</p>
          <dl>
            ${profile.location ? tpl`<dt>Location</dt><dd>${profile.location}</dd>` : ""}
            ${profile.website ? tpl`<dt>Website</dt><dd><a href="${profile.website}" rel="nofollow noopener">${profile.website}</a></dd>` : ""}
          </dl>
          ${profile.about ? tpl`<section class="about"><h2>About</h2>${linebreaks(profile.about)}</section>` : ""}
          ${isMe ? tpl`<p class="is-me"><a href="${urls("profile_edit")}">Edit your profile</a></p>` : ""}
        </article>
      </main>
    `,
    canonicalUrl,
  );
};

// --- Profile edit ---

export interface ProfileEditView {
  values: FormValues;
  errors: FormErrors;
  viewer: string;
  urls: UrlResolver;
}

/**
 * The edit form on its own, as served to XMLHttpRequest callers.
 */
export const profileEditForm = ({ values, errors, urls }: ProfileEditView): HTML =>
  tpl`<form method="post" action="${urls("profile_edit")}" class="profile-edit">
    ${PROFILE_FIELDS.map((field) => formField(field, values, errors))}
    <button type="submit">Save</button>
  </form>`;

export const profileEdit = (view: ProfileEditView): HTML =>
  shellPage(
    "Edit profile",
    tpl`
      ${headerBar(view.urls, view.viewer)}
      <main id="main-content">
        <h1>Edit profile</h1>
        ${profileEditForm(view)}
      </main>
    `,
  );
