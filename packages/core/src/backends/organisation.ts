import { ModelClient, type ModelClientDependencies, type UploadBackend } from '../client/model-client.js';
import type { UploaderConfigInput } from '../config.js';
import type { PathMap } from '../routing/path-resolver.js';
import type { DomainObject, SerializeOptions } from '../types.js';

const DETAILS_CREATE = '/service/details/create';
const DETAILS_EDIT = '/service/details/edit';
const FACET_CLASS = '/service/f/{facet_uuid}/';

/**
 * Type tags understood by the organisation registry
 */
export const OrganisationObjectType = {
  ADDRESS: 'address',
  ASSOCIATION: 'association',
  CLASS: 'class',
  EMPLOYEE: 'employee',
  ENGAGEMENT: 'engagement',
  ENGAGEMENT_ASSOCIATION: 'engagement_association',
  IT_USER: 'it',
  KLE: 'kle',
  LEAVE: 'leave',
  MANAGER: 'manager',
  ORG_UNIT: 'org_unit',
  ROLE: 'role',
} as const;

export type OrganisationObjectType =
  (typeof OrganisationObjectType)[keyof typeof OrganisationObjectType];

export interface OrganisationObject extends DomainObject {
  readonly type: OrganisationObjectType;
  readonly uuid?: string;
}

const Type = OrganisationObjectType;

export const ORGANISATION_CREATE_PATHS: PathMap = {
  [Type.ADDRESS]: DETAILS_CREATE,
  [Type.ASSOCIATION]: DETAILS_CREATE,
  [Type.CLASS]: FACET_CLASS,
  [Type.EMPLOYEE]: '/service/e/create',
  [Type.ENGAGEMENT]: DETAILS_CREATE,
  [Type.ENGAGEMENT_ASSOCIATION]: DETAILS_CREATE,
  [Type.IT_USER]: DETAILS_CREATE,
  [Type.KLE]: DETAILS_CREATE,
  [Type.LEAVE]: DETAILS_CREATE,
  [Type.MANAGER]: DETAILS_CREATE,
  [Type.ORG_UNIT]: '/service/ou/create',
  [Type.ROLE]: DETAILS_CREATE,
};

export const ORGANISATION_EDIT_PATHS: PathMap = {
  [Type.ADDRESS]: DETAILS_EDIT,
  [Type.ASSOCIATION]: DETAILS_EDIT,
  [Type.CLASS]: FACET_CLASS,
  [Type.EMPLOYEE]: DETAILS_EDIT,
  [Type.ENGAGEMENT]: DETAILS_EDIT,
  [Type.IT_USER]: DETAILS_EDIT,
  [Type.KLE]: DETAILS_EDIT,
  [Type.LEAVE]: DETAILS_EDIT,
  [Type.MANAGER]: DETAILS_EDIT,
  [Type.ORG_UNIT]: DETAILS_EDIT,
  [Type.ROLE]: DETAILS_EDIT,
};

/**
 * Routes by tag alone, so it also accepts objects whose tag it does not know;
 * those fail with `UnknownTypeError` at submission.
 */
export const organisationBackend: UploadBackend<DomainObject> = {
  healthcheckEndpoints: [{ path: '/version/', marker: 'mo_version' }],
  createPaths: ORGANISATION_CREATE_PATHS,
  editPaths: ORGANISATION_EDIT_PATHS,
  queryParameters: (config) => ({ force: config.force ? 1 : 0 }),
  serialize: serializeOrganisationObject,
};

/**
 * Create requests carry the object itself. Edit requests wrap the fields that
 * were actually set in `{ uuid, type, data }`.
 */
export function serializeOrganisationObject(
  obj: DomainObject,
  options: SerializeOptions
): unknown {
  if (!options.edit) {
    return toJsonValue(obj, false);
  }

  return {
    uuid: obj.uuid,
    type: obj.type,
    data: toJsonValue(obj, true),
  };
}

/**
 * JSON-compatible copy of a value. Dates become ISO strings and undefined
 * fields are dropped; `excludeUnset` drops null fields as well.
 */
export function toJsonValue(value: unknown, excludeUnset: boolean): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item, excludeUnset));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      if (field === undefined || (excludeUnset && field === null)) {
        continue;
      }
      result[key] = toJsonValue(field, excludeUnset);
    }
    return result;
  }

  return value;
}

export function createOrganisationClient(
  config: UploaderConfigInput = {},
  dependencies: ModelClientDependencies = {}
): ModelClient<OrganisationObject> {
  return new ModelClient<OrganisationObject>(organisationBackend, config, dependencies);
}
