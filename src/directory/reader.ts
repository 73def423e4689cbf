/**
 * LDAP directory reader
 *
 * Binds with the service account, runs one subtree search with the
 * candidate-user filter and shapes the entries into DirectoryUser values.
 * Every connect/bind/search failure surfaces as DirectoryUnavailableError.
 */

import * as fs from 'node:fs';
import { Client, type ClientOptions } from 'ldapts';
import { DirectoryUnavailableError, describeError } from '../errors.js';
import { normalizeEmail } from '../utils/email.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { buildLdapFilter } from './filter.js';
import type {
  DirectoryEntry,
  DirectoryReadOptions,
  DirectoryUser,
  EntryShapeOptions,
  LdapSearchClient,
  ShapeResult,
} from './types.js';

/**
 * Collaborators the reader can be given instead of the real ones
 */
export interface DirectoryReaderDeps {
  createClient?: (options: ClientOptions) => LdapSearchClient;
  readFile?: (path: string) => Buffer;
  logger?: Logger;
}

// =============================================================================
// Entry shaping
// =============================================================================

/**
 * Read an attribute's values as strings, matching the name case-insensitively
 */
export function attributeValues(entry: DirectoryEntry, name: string): string[] {
  const wanted = name.toLowerCase();
  const key = Object.keys(entry).find((k) => k !== 'dn' && k.toLowerCase() === wanted);
  if (key === undefined) {
    return [];
  }

  const raw = entry[key];
  const list: Array<string | Buffer> = Array.isArray(raw) ? raw : [raw];
  return list
    .map((value) => (typeof value === 'string' ? value : value.toString('utf8')))
    .filter((value) => value.length > 0);
}

/**
 * Decide whether an entry is disabled
 *
 * The attribute must carry one of the configured values exactly (the match is
 * case-sensitive). An absent or empty attribute, or no configured attribute,
 * falls back to `missingIsDisabled`.
 */
export function isEntryDisabled(entry: DirectoryEntry, options: EntryShapeOptions): boolean {
  if (!options.disabledAttribute) {
    return options.missingIsDisabled;
  }

  const values = attributeValues(entry, options.disabledAttribute);
  if (values.length === 0) {
    return options.missingIsDisabled;
  }

  return values.some((value) => options.disabledValues.includes(value));
}

/**
 * Turn raw entries into candidate users
 *
 * Entries without a usable mail value are skipped. When several entries share
 * an email the last one wins.
 */
export function shapeEntries(entries: DirectoryEntry[], options: EntryShapeOptions): ShapeResult {
  const byEmail = new Map<string, DirectoryUser>();
  const skipped: ShapeResult['skipped'] = [];
  const duplicates = new Set<string>();

  for (const entry of entries) {
    const [mail] = attributeValues(entry, options.mailAttribute);
    const email = mail === undefined ? '' : normalizeEmail(mail);

    if (!email) {
      skipped.push({ dn: entry.dn, reason: `missing ${options.mailAttribute} attribute` });
      continue;
    }

    if (byEmail.has(email)) {
      duplicates.add(email);
      byEmail.delete(email);
    }

    byEmail.set(email, {
      dn: entry.dn,
      email,
      disabled: isEntryDisabled(entry, options),
      groups: attributeValues(entry, options.groupAttribute),
    });
  }

  return {
    users: [...byEmail.values()],
    skipped,
    duplicates: [...duplicates],
  };
}

// =============================================================================
// Search
// =============================================================================

function buildClientOptions(options: DirectoryReadOptions, deps: DirectoryReaderDeps): ClientOptions {
  const clientOptions: ClientOptions = {
    url: options.url,
    timeout: options.timeoutMs,
    connectTimeout: options.timeoutMs,
  };

  if (options.url.toLowerCase().startsWith('ldaps://')) {
    const readFile = deps.readFile ?? ((path: string) => fs.readFileSync(path));
    clientOptions.tlsOptions = {
      rejectUnauthorized: !options.ignoreCert,
      ca: !options.ignoreCert && options.caFile ? [readFile(options.caFile)] : undefined,
    };
  }

  return clientOptions;
}

/**
 * Attributes requested from the directory
 */
export function requestedAttributes(options: EntryShapeOptions): string[] {
  const attributes = [options.mailAttribute, options.groupAttribute];
  if (options.disabledAttribute) {
    attributes.push(options.disabledAttribute);
  }
  return attributes;
}

/**
 * Fetch candidate users from the directory
 *
 * @throws DirectoryUnavailableError when the directory cannot be read
 */
export async function fetchDirectoryUsers(
  options: DirectoryReadOptions,
  deps: DirectoryReaderDeps = {}
): Promise<DirectoryUser[]> {
  const log = deps.logger ?? defaultLogger;
  const filter = buildLdapFilter(options.filter);
  const attributes = requestedAttributes(options);

  let client: LdapSearchClient;
  try {
    const clientOptions = buildClientOptions(options, deps);
    client = deps.createClient ? deps.createClient(clientOptions) : new Client(clientOptions);
  } catch (err) {
    throw new DirectoryUnavailableError(
      `Cannot set up LDAP connection to ${options.url}: ${describeError(err)}`,
      { cause: err }
    );
  }

  log.debug('Searching LDAP directory', { baseDn: options.baseDn, filter, attributes });

  let entries: DirectoryEntry[];
  try {
    if (options.bindDn) {
      await client.bind(options.bindDn, options.bindPassword);
    }
    const { searchEntries } = await client.search(options.baseDn, {
      scope: 'sub',
      filter,
      attributes,
    });
    entries = searchEntries;
  } catch (err) {
    throw new DirectoryUnavailableError(
      `LDAP search against ${options.url} failed: ${describeError(err)}`,
      { cause: err }
    );
  } finally {
    try {
      await client.unbind();
    } catch (err) {
      log.debug('LDAP unbind failed', { error: describeError(err) });
    }
  }

  const { users, skipped, duplicates } = shapeEntries(entries, options);

  for (const entry of skipped) {
    log.warn(`Skipping LDAP entry ${entry.dn}: ${entry.reason}`);
  }
  for (const email of duplicates) {
    log.warn(`Duplicate LDAP entries for ${email}; using the last one returned`);
  }

  log.debug(`Fetched ${users.length} LDAP users`, {
    entries: entries.length,
    skipped: skipped.length,
    disabled: users.filter((u) => u.disabled).length,
  });
  for (const user of users) {
    log.debug(`LDAP: ${user.dn} - ${user.email} - ${user.disabled ? 'disabled' : 'enabled'}`);
  }

  return users;
}
