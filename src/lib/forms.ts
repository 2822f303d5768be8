// forms.ts - Profile edit form validation

import {
  PROFILE_LOCATION_MAX_LENGTH,
  PROFILE_NAME_MAX_LENGTH,
  PROFILE_WEBSITE_MAX_LENGTH,
} from "./config.ts";
import type { Profile } from "./profiles.ts";

export type ProfileField = keyof Profile;

export const PROFILE_FIELDS: readonly ProfileField[] = ["name", "about", "location", "website"];

export type FormValues = Record<ProfileField, string>;
export type FormErrors = Partial<Record<ProfileField, string>>;

export type FormResult =
  | { ok: true; profile: Profile }
  | { ok: false; values: FormValues; errors: FormErrors };

/** Anything with a FormData-like `get`, e.g. FormData or URLSearchParams */
export interface FormSource {
  get(name: string): FormDataEntryValue | null;
}

const textValue = (source: FormSource, field: ProfileField): string => {
  const value = source.get(field);
  return typeof value === "string" ? value.trim() : "";
};

// Length in code points
const charCount = (value: string): number => [...value].length;

const tooLong = (max: number): string => `Ensure this value has at most ${max} characters.`;

/**
 * Normalize a website value: assume http:// when no scheme is given.
 * Returns null when the result is not an http(s) URL with a dotted host.
 */
export function normalizeWebsite(value: string): string | null {
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(value) ? value : `http://${value}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  if (!url.hostname.includes(".") && url.hostname !== "localhost") return null;
  return url.toString();
}

export function profileToValues(profile: Profile): FormValues {
  return {
    name: profile.name ?? "",
    about: profile.about ?? "",
    location: profile.location ?? "",
    website: profile.website ?? "",
  };
}

/**
 * Validate submitted profile fields. Values are trimmed and blanks
 * become null.
 */
export function validateProfileForm(source: FormSource): FormResult {
  const values: FormValues = {
    name: textValue(source, "name"),
    about: textValue(source, "about"),
    location: textValue(source, "location"),
    website: textValue(source, "website"),
  };
  const errors: FormErrors = {};

  if (charCount(values.name) > PROFILE_NAME_MAX_LENGTH) {
    errors.name = tooLong(PROFILE_NAME_MAX_LENGTH);
  }
  if (charCount(values.location) > PROFILE_LOCATION_MAX_LENGTH) {
    errors.location = tooLong(PROFILE_LOCATION_MAX_LENGTH);
  }

  let website: string | null = null;
  if (values.website) {
    website = normalizeWebsite(values.website);
    if (website === null) {
      errors.website = "Enter a valid URL.";
    } else if (charCount(website) > PROFILE_WEBSITE_MAX_LENGTH) {
      errors.website = tooLong(PROFILE_WEBSITE_MAX_LENGTH);
    }
  }

  if (Object.keys(errors).length > 0) {
    return { ok: false, values, errors };
  }

  return {
    ok: true,
    profile: {
      name: values.name || null,
      about: values.about || null,
      location: values.location || null,
      website,
    },
  };
}
