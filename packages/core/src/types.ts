/**
 * A caller-owned object to submit. `type` is the stable tag used for grouping
 * and routing; the remaining fields are serialized as the request body.
 */
export interface DomainObject {
  readonly type: string;
  readonly [field: string]: unknown;
}

export type SerializeOptions = {
  edit: boolean;
};
