import { PathTemplateError, UnknownTypeError } from '../errors.js';
import type { DomainObject } from '../types.js';

/** Type tag to URL template, e.g. `{ class: '/service/f/{facet_uuid}/' }` */
export type PathMap = Readonly<Record<string, string>>;

export type QueryParameters = Readonly<Record<string, string | number | boolean>>;

export type ResolvedTarget = {
  url: string;
  method: 'POST';
};

export type PathResolverOptions = {
  baseUrl: string;
  createPaths: PathMap;
  editPaths: PathMap;
  queryParameters?: QueryParameters;
};

const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/g;

/**
 * Maps an object to the URL it is submitted to. Lookups fail closed: a type
 * without an entry is an error, never a default route.
 */
export class PathResolver {
  private readonly baseUrl: string;

  constructor(private readonly options: PathResolverOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  has(objectType: string, edit: boolean): boolean {
    return Object.prototype.hasOwnProperty.call(this.pathMap(edit), objectType);
  }

  resolve(obj: DomainObject, edit: boolean): ResolvedTarget {
    if (!this.has(obj.type, edit)) {
      throw new UnknownTypeError(obj.type);
    }

    const template = this.pathMap(edit)[obj.type];
    const path = fillTemplate(template, obj);
    return { url: appendQuery(`${this.baseUrl}${path}`, this.options.queryParameters), method: 'POST' };
  }

  private pathMap(edit: boolean): PathMap {
    return edit ? this.options.editPaths : this.options.createPaths;
  }
}

function fillTemplate(template: string, obj: DomainObject): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, field: string) => {
    const value = obj[field];
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return encodeURIComponent(String(value));
    }
    throw new PathTemplateError(template, field);
  });
}

function appendQuery(url: string, query: QueryParameters | undefined): string {
  if (!query) {
    return url;
  }

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    search.append(key, String(value));
  }

  const queryString = search.toString();
  if (!queryString) {
    return url;
  }

  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}${queryString}`;
}
