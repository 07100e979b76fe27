import { chmod, readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import type { Outcome, RequiredKey, SecretBundle } from '../types';
import { REQUIRED_KEYS, fileExists, getStorePath } from './config';
import { decodeBase64, open, seal } from './crypto';
import {
  AuthenticationError,
  FormatError,
  MissingCredentialError,
  TaskSafeError,
} from './errors';
import type { ValueProvider } from './prompt';

const bundleSchema = z.record(z.string(), z.string());

const MASTER_PASSWORD_PROMPT = 'Master password: ';
const NEW_MASTER_PASSWORD_PROMPT = 'New master password (required to unlock these settings): ';

export interface LoadedBundle {
  exists: boolean;
  bundle: SecretBundle;
}

export interface EnsuredBundle {
  bundle: SecretBundle;
  changed: boolean;
}

/**
 * Canonical encoding of a bundle: JSON with keys in sorted order
 */
export function serializeBundle(bundle: SecretBundle): Buffer {
  const sorted: SecretBundle = {};
  for (const key of Object.keys(bundle).sort()) {
    sorted[key] = bundle[key];
  }
  return Buffer.from(JSON.stringify(sorted), 'utf-8');
}

export function parseBundle(plaintext: Buffer): SecretBundle {
  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext.toString('utf-8'));
  } catch {
    throw new FormatError('Secret store does not contain valid JSON');
  }

  const result = bundleSchema.safeParse(parsed);
  if (!result.success) {
    throw new FormatError('Secret store does not contain a mapping of string values');
  }
  return result.data;
}

/**
 * Read and decrypt the store. Without a store file nothing is asked
 * and an empty bundle comes back.
 */
export async function loadBundle(
  storePath: string,
  provider: ValueProvider
): Promise<Outcome<LoadedBundle>> {
  if (!(await fileExists(storePath))) {
    return { ok: true, value: { exists: false, bundle: {} } };
  }

  const masterPassword = await provider.ask(MASTER_PASSWORD_PROMPT, { secret: true });
  const content = await readFile(storePath, 'utf-8');

  try {
    const plaintext = open(decodeBase64(content), masterPassword);
    return { ok: true, value: { exists: true, bundle: parseBundle(plaintext) } };
  } catch (error) {
    if (error instanceof AuthenticationError || error instanceof FormatError) {
      return {
        ok: false,
        error: new AuthenticationError(
          `Cannot unlock ${storePath}: wrong master password or corrupted store`
        ),
      };
    }
    throw error;
  }
}

/**
 * Ask for every required value that is absent or blank.
 * A blank answer is fatal unless the key allows it; keeping a blank
 * value blank is not a change.
 */
export async function ensureRequiredKeys(
  bundle: SecretBundle,
  required: readonly RequiredKey[],
  provider: ValueProvider
): Promise<Outcome<EnsuredBundle>> {
  const next: SecretBundle = { ...bundle };
  let changed = false;

  for (const key of required) {
    const current = next[key.name];
    if (current !== undefined && current.trim() !== '') {
      continue;
    }

    const answer = (await provider.ask(key.prompt, { secret: key.secret })).trim();
    if (!answer && !key.allowBlank) {
      return {
        ok: false,
        error: new MissingCredentialError(key.name, `${key.name} is required and cannot be blank`),
      };
    }

    if (answer !== current) {
      next[key.name] = answer;
      changed = true;
    }
  }

  return { ok: true, value: { bundle: next, changed } };
}

/**
 * Seal the bundle with the master password and write it as base64 text
 */
export async function persistBundle(
  storePath: string,
  bundle: SecretBundle,
  masterPassword: string
): Promise<void> {
  const envelope = seal(serializeBundle(bundle), masterPassword);
  try {
    await writeFile(storePath, envelope.toString('base64') + '\n', { encoding: 'utf-8', mode: 0o600 });
    // mode only applies on create
    await chmod(storePath, 0o600);
  } catch (error) {
    throw new TaskSafeError(`Failed to write ${storePath}: ${(error as Error).message}`);
  }
}

export interface UnlockOptions {
  dataDir?: string;
  required?: readonly RequiredKey[];
}

export interface UnlockedStore {
  bundle: SecretBundle;
  created: boolean;
  persisted: boolean;
}

/**
 * Load the store, fill in missing values and persist when anything was new.
 * The master password for a write is always asked for again.
 */
export async function unlockSecretStore(
  provider: ValueProvider,
  options: UnlockOptions = {}
): Promise<Outcome<UnlockedStore>> {
  const storePath = getStorePath(options.dataDir);

  const loaded = await loadBundle(storePath, provider);
  if (!loaded.ok) {
    return loaded;
  }

  const ensured = await ensureRequiredKeys(
    loaded.value.bundle,
    options.required ?? REQUIRED_KEYS,
    provider
  );
  if (!ensured.ok) {
    return ensured;
  }

  const { bundle, changed } = ensured.value;
  if (loaded.value.exists && !changed) {
    return { ok: true, value: { bundle, created: false, persisted: false } };
  }

  const masterPassword = await provider.ask(NEW_MASTER_PASSWORD_PROMPT, { secret: true });
  if (!masterPassword) {
    return {
      ok: false,
      error: new MissingCredentialError('master password', 'Master password cannot be blank'),
    };
  }

  await persistBundle(storePath, bundle, masterPassword);
  return { ok: true, value: { bundle, created: !loaded.value.exists, persisted: true } };
}
