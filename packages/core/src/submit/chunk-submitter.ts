import assert from 'node:assert/strict';
import { UnknownTypeError } from '../errors.js';
import type { PathResolver } from '../routing/path-resolver.js';
import type { DomainObject } from '../types.js';
import type { ObjectSubmitter } from './object-submitter.js';

/**
 * Submits a homogeneous chunk by posting every member at once. The chunk
 * fails as a whole on the first failed member.
 */
export class ChunkSubmitter<T extends DomainObject> {
  constructor(
    private readonly submitter: ObjectSubmitter<T>,
    private readonly resolver: PathResolver
  ) {}

  async submitChunk(objects: readonly T[], edit = false): Promise<unknown[]> {
    assert.ok(objects.length > 0, 'Cannot submit an empty chunk');
    const objectType = objects[0].type;
    assert.ok(
      objects.every((obj) => obj.type === objectType),
      `Chunk mixes types; expected only '${objectType}'`
    );

    if (!this.resolver.has(objectType, edit)) {
      throw new UnknownTypeError(objectType);
    }

    return Promise.all(objects.map((obj) => this.submitter.submitOne(obj, edit)));
  }
}
