import { readFile, writeFile } from 'node:fs/promises';
import {
  type DomainObject,
  ModelClient,
  type ModelClientDependencies,
  organisationBackend,
} from '@batch-uploader/core';
import { type Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';

export type GlobalOptions = {
  baseUrl?: string;
  token?: string;
  sessionToken?: string;
  force?: boolean;
};

export type CliDependencies = ModelClientDependencies;

const DomainObjectListSchema = z.array(z.object({ type: z.string().min(1) }).passthrough());

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'.`);
  }
  return parsed;
}

export function createClient(
  command: Command,
  overrides: { chunkSize?: number },
  dependencies: CliDependencies
): ModelClient<DomainObject> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const headers: Record<string, string> = {};
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }
  if (options.sessionToken) {
    headers.SESSION = options.sessionToken;
  }

  return new ModelClient<DomainObject>(
    organisationBackend,
    {
      baseUrl: options.baseUrl,
      force: options.force,
      chunkSize: overrides.chunkSize,
      headers,
    },
    dependencies
  );
}

export async function readObjectsFile(filePath: string): Promise<DomainObject[]> {
  let contents: string;
  try {
    contents = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new Error(
      `Unable to read ${filePath}: ${error instanceof Error ? error.message : 'Unknown file read error'}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new Error(
      `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : 'Unknown JSON parsing error'}`
    );
  }

  const result = DomainObjectListSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `${filePath} must be a JSON array of objects with a string "type": ${result.error.issues[0]?.message ?? 'invalid input'}`
    );
  }
  return result.data;
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
}
