// render/components.ts - Reusable UI components

import { type HTML, type HTMLValue, html, raw } from "../html.ts";
import type { Account, ProfileOrder } from "../profiles.ts";
import type { FormErrors, FormValues, ProfileField } from "../forms.ts";
import type { UrlResolver } from "../routes.ts";

export const sharedStyles = (): HTML =>
  html`<style>
    * { box-sizing: border-box; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Helvetica, Arial, sans-serif;
      background-color: whitesmoke;
      margin: 40px auto;
      max-width: 80ch;
      line-height: 1.6;
      font-size: 18px;
      color: #444;
      padding: 0 10px;
    }
    header nav a { margin-right: 1em; }
    ol.profiles { padding-left: 1.5em; }
    .profile-meta { font-size: 0.85em; opacity: 0.8; }
    .field { margin-bottom: 1em; }
    .field label { display: block; font-weight: bold; }
    .field input, .field textarea { width: 100%; font: inherit; }
    .errorlist { color: #b00020; margin: 0; padding: 0; list-style: none; }
    .pagination a { margin: 0 0.5em; }
  </style>`;

/**
 * Free text as paragraphs: blank lines split paragraphs, single newlines
 * become `<br>`.
 */
export const linebreaks = (text: string): HTML => {
  const paragraphs = text.replace(/\r\n?/g, "\n").trim().split(/\n\s*\n/);
  return html`${paragraphs.map((paragraph) =>
    html`<p>${paragraph.split("\n").flatMap((line, i): HTMLValue[] => (i === 0 ? [line] : [raw("<br>"), line]))}</p>`
  )}`;
};

export const headerBar = (urls: UrlResolver, viewer: string | null): HTML =>
  html`<header>
    <nav aria-label="Profiles">
      <a href="${urls("profile_list")}">All profiles</a>
      ${
    viewer
      ? html`<a href="${urls("profile_detail", { username: viewer })}">My profile</a>
      <a href="${urls("profile_edit")}">Edit profile</a>`
      : ""
  }
    </nav>
  </header>`;

export const profileSummary = (account: Account, urls: UrlResolver): HTML =>
  html`<li>
    <a href="${urls("profile_detail", { username: account.username })}">${account.username}</a>
    ${account.profile.name ? html` <span>(${account.profile.name})</span>` : ""}
    <div class="profile-meta">
      Joined ${account.dateJoined.toISOString().slice(0, 10)}${
    account.profile.location ? html` &middot; ${account.profile.location}` : ""
  }
    </div>
  </li>`;

const listQuery = (search: string, order: ProfileOrder, page: number): string => {
  const params = new URLSearchParams();
  if (search) params.set("search", search);
  params.set("order", order);
  if (page > 1) params.set("page", String(page));
  return `?${params.toString()}`;
};

export const orderLinks = (
  listUrl: string,
  search: string,
  order: ProfileOrder,
): HTML =>
  html`<p class="order">
    Order by:
    ${order === "date" ? html`<strong>newest</strong>` : html`<a href="${listUrl}${listQuery(search, "date", 1)}">newest</a>`}
    ${order === "name" ? html`<strong>name</strong>` : html`<a href="${listUrl}${listQuery(search, "name", 1)}">name</a>`}
  </p>`;

export const pagination = (
  listUrl: string,
  search: string,
  order: ProfileOrder,
  page: number,
  totalPages: number,
): HTML =>
  totalPages <= 1 ? html`` : html`<nav class="pagination" aria-label="Pagination">
    ${page > 1 ? html`<a rel="prev" href="${listUrl}${listQuery(search, order, page - 1)}">Previous</a>` : ""}
    <span>Page ${page} of ${totalPages}</span>
    ${page < totalPages ? html`<a rel="next" href="${listUrl}${listQuery(search, order, page + 1)}">Next</a>` : ""}
  </nav>`;

const FIELD_LABELS: Record<ProfileField, string> = {
  name: "Name",
  about: "About",
  location: "Location",
  website: "Website",
};

export const formField = (field: ProfileField, values: FormValues, errors: FormErrors): HTML => {
  const error = errors[field];
  const control = field === "about"
    ? html`<textarea id="id_${field}" name="${field}" rows="6">${values[field]}</textarea>`
    : html`<input id="id_${field}" type="text" name="${field}" value="${values[field]}">`;

  return html`<div class="field">
    ${error ? html`<ul class="errorlist"><li>${error}</li></ul>` : ""}
    <label for="id_${field}">${FIELD_LABELS[field]}</label>
    ${control}
  </div>`;
};
