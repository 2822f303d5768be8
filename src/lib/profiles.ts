// profiles.ts - Member accounts and their profiles

import { readFile } from "node:fs/promises";
import { NotFoundError, ValidationError } from "./errors/types.ts";
import { USERNAME_PATTERN } from "./config.ts";
import { normalizeWebsite } from "./forms.ts";
import { log } from "./logger.ts";

export interface Profile {
  name: string | null;
  about: string | null;
  location: string | null;
  website: string | null;
}

export interface Account {
  username: string;
  dateJoined: Date;
  profile: Profile;
}

export type ProfileOrder = "date" | "name";

export const PROFILE_ORDERS: readonly ProfileOrder[] = ["date", "name"];

export interface ProfileQuery {
  /** Case-insensitive substring of the username */
  search?: string;
  order?: ProfileOrder;
  page?: number;
  perPage: number;
}

export interface ProfilePage {
  accounts: Account[];
  page: number;
  perPage: number;
  total: number;
  totalPages: number;
}

export interface ProfileRepository {
  list(query: ProfileQuery): Promise<ProfilePage>;
  findByUsername(username: string): Promise<Account | null>;
  updateProfile(username: string, profile: Profile): Promise<Account>;
  autocomplete(prefix: string, limit: number): Promise<Account[]>;
}

export function isProfileOrder(value: string): value is ProfileOrder {
  return PROFILE_ORDERS.some((order) => order === value);
}

const byUsername = (a: Account, b: Account): number =>
  a.username < b.username ? -1 : a.username > b.username ? 1 : 0;

const byNewest = (a: Account, b: Account): number =>
  b.dateJoined.getTime() - a.dateJoined.getTime() || byUsername(a, b);

const copy = (account: Account): Account => ({
  username: account.username,
  dateJoined: new Date(account.dateJoined.getTime()),
  profile: { ...account.profile },
});

/**
 * Process-local account store. Every read returns copies so callers
 * cannot mutate stored state.
 */
export class InMemoryProfileRepository implements ProfileRepository {
  #accounts = new Map<string, Account>();

  constructor(accounts: Account[] = []) {
    for (const account of accounts) this.add(account);
  }

  get size(): number {
    return this.#accounts.size;
  }

  add(account: Account): this {
    if (!USERNAME_PATTERN.test(account.username)) {
      throw new ValidationError("username", account.username, "Usernames may only contain letters, digits, dots, underscores and hyphens.");
    }
    if (this.#accounts.has(account.username)) {
      throw new ValidationError("username", account.username, "That username is already taken.");
    }
    this.#accounts.set(account.username, copy(account));
    return this;
  }

  list({ search, order = "date", page = 1, perPage }: ProfileQuery): Promise<ProfilePage> {
    const needle = search?.trim().toLowerCase() ?? "";
    const matches = [...this.#accounts.values()]
      .filter((account) => !needle || account.username.toLowerCase().includes(needle))
      .sort(order === "name" ? byUsername : byNewest);

    const start = (page - 1) * perPage;
    return Promise.resolve({
      accounts: matches.slice(start, start + perPage).map(copy),
      page,
      perPage,
      total: matches.length,
      totalPages: Math.max(1, Math.ceil(matches.length / perPage)),
    });
  }

  findByUsername(username: string): Promise<Account | null> {
    const account = this.#accounts.get(username);
    return Promise.resolve(account ? copy(account) : null);
  }

  updateProfile(username: string, profile: Profile): Promise<Account> {
    const account = this.#accounts.get(username);
    if (!account) {
      return Promise.reject(new NotFoundError("profile", username));
    }
    account.profile = { ...profile };
    return Promise.resolve(copy(account));
  }

  autocomplete(prefix: string, limit: number): Promise<Account[]> {
    const needle = prefix.toLowerCase();
    const matches = [...this.#accounts.values()]
      .filter((account) => account.username.toLowerCase().startsWith(needle))
      .sort(byUsername)
      .slice(0, limit);
    return Promise.resolve(matches.map(copy));
  }
}

// --- Seed data ---

const optionalString = (record: Record<string, unknown>, key: string): string | null => {
  const value = record[key];
  if (value === undefined || value === null || value === "") return null;
  if (typeof value !== "string") {
    throw new ValidationError(key, value, `Expected "${key}" to be a string.`);
  }
  return value;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Validate parsed seed JSON: an array of
 * `{ username, dateJoined, name?, about?, location?, website? }`.
 */
export function parseSeed(data: unknown): Account[] {
  if (!Array.isArray(data)) {
    throw new ValidationError("seed", typeof data, "Seed data must be an array of accounts.");
  }

  return data.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new ValidationError(`seed[${index}]`, entry, "Each seed entry must be an object.");
    }
    const { username, dateJoined } = entry;
    if (typeof username !== "string") {
      throw new ValidationError(`seed[${index}].username`, username);
    }
    const joined = typeof dateJoined === "string" ? new Date(dateJoined) : null;
    if (!joined || Number.isNaN(joined.getTime())) {
      throw new ValidationError(`seed[${index}].dateJoined`, dateJoined);
    }
    const rawWebsite = optionalString(entry, "website");
    const website = rawWebsite === null ? null : normalizeWebsite(rawWebsite);
    if (rawWebsite !== null && website === null) {
      throw new ValidationError(`seed[${index}].website`, rawWebsite, "Enter a valid URL.");
    }
    return {
      username,
      dateJoined: joined,
      profile: {
        name: optionalString(entry, "name"),
        about: optionalString(entry, "about"),
        location: optionalString(entry, "location"),
        website,
      },
    };
  });
}

export async function loadSeedFile(path: string): Promise<Account[]> {
  const text = await readFile(path, "utf8");
  const accounts = parseSeed(JSON.parse(text));
  log.info("Loaded profile seed", { path, accounts: accounts.length });
  return accounts;
}
