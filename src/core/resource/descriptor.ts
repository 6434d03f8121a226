/**
 * Resource descriptors
 *
 * A descriptor is the smallest amount of information needed to route requests
 * for a resource type that has no generated client: kind, group, version and
 * an optional namespace. The collection name and apiVersion are derived once,
 * when the descriptor is built.
 *
 * @example
 * ```typescript
 * const foos = customResource('Foo').group('clux.dev').version('v1').within('myns').build();
 * foos.apiVersion; // 'clux.dev/v1'
 * foos.plural;     // 'foos'
 * ```
 */

import { type } from 'arktype';
import { englishInflector, type Inflector } from '../../utils/inflection.js';
import { formatArktypeError, ResourceDefinitionError } from '../errors.js';
import { getResourceLogger } from '../logging/index.js';

/**
 * Identity of a resource type, as supplied by the caller
 */
export interface ResourceIdentity {
  kind: string;
  /**
   * API group; the empty string is the core group
   */
  group: string;
  version: string;
  namespace?: string;
}

export interface ResourceDescriptor {
  readonly kind: string;
  readonly group: string;
  readonly version: string;
  readonly apiVersion: string;
  readonly namespace?: string;
  /**
   * Collection name used in request paths
   */
  readonly plural: string;
}

export interface DescriptorOptions {
  inflector?: Inflector;
}

const ResourceIdentitySchema = type({
  kind: 'string > 0',
  group: 'string',
  version: 'string > 0',
  'namespace?': 'string > 0',
});

export function formatApiVersion(group: string, version: string): string {
  return group === '' ? version : `${group}/${version}`;
}

export function isNamespaced(
  descriptor: ResourceDescriptor
): descriptor is ResourceDescriptor & { readonly namespace: string } {
  return descriptor.namespace !== undefined;
}

/**
 * Reject kinds that can never route correctly: empty, not PascalCase, or
 * already plural. The plural check compares the kind against its own plural,
 * so kinds whose plural is identical (e.g. "Sheep") are rejected too.
 */
function assertValidKind(kind: string, inflector: Inflector): void {
  if (kind === '') {
    throw new ResourceDefinitionError('Resource kind must not be empty', kind, 'kind', [
      "Pass the singular kind, e.g. customResource('Foo')",
    ]);
  }

  if (!inflector.isPascalCase(kind)) {
    throw new ResourceDefinitionError(
      `Resource kind '${kind}' must be PascalCase (e.g. 'CronTab')`,
      kind,
      'kind',
      ['Use the kind exactly as it appears in the CRD spec.names.kind']
    );
  }

  const lower = kind.toLowerCase();
  if (inflector.pluralize(lower) === lower) {
    throw new ResourceDefinitionError(
      `Resource kind '${kind}' looks plural; pass the singular kind`,
      kind,
      'kind',
      ['The collection name is derived from the kind, do not pluralize it yourself']
    );
  }
}

function assembleDescriptor(identity: ResourceIdentity, inflector: Inflector): ResourceDescriptor {
  const result = ResourceIdentitySchema(identity);
  if (result instanceof type.errors) {
    throw formatArktypeError(result, identity.kind);
  }

  const descriptor: ResourceDescriptor = Object.freeze({
    kind: result.kind,
    group: result.group,
    version: result.version,
    apiVersion: formatApiVersion(result.group, result.version),
    ...(result.namespace !== undefined && { namespace: result.namespace }),
    plural: inflector.pluralize(result.kind.toLowerCase()),
  });

  getResourceLogger(descriptor.kind, descriptor.apiVersion, descriptor.namespace, {
    component: 'resource-descriptor',
  }).debug('Resource descriptor built', { plural: descriptor.plural });

  return descriptor;
}

interface BuilderState {
  readonly kind: string;
  readonly group?: string;
  readonly version?: string;
  readonly namespace?: string;
}

/**
 * Fluent builder for {@link ResourceDescriptor}. Every setter returns a new
 * builder, so a builder can be reused as a template for several descriptors.
 */
export class CustomResourceBuilder {
  private constructor(
    private readonly state: BuilderState,
    private readonly inflector: Inflector
  ) {}

  static forKind(kind: string, options: DescriptorOptions = {}): CustomResourceBuilder {
    const inflector = options.inflector ?? englishInflector;
    assertValidKind(kind, inflector);
    return new CustomResourceBuilder({ kind }, inflector);
  }

  /**
   * Set the API group (spec.group of the CRD); '' for the core group
   */
  group(group: string): CustomResourceBuilder {
    return new CustomResourceBuilder({ ...this.state, group }, this.inflector);
  }

  version(version: string): CustomResourceBuilder {
    return new CustomResourceBuilder({ ...this.state, version }, this.inflector);
  }

  /**
   * Scope the resource to a namespace
   */
  within(namespace: string): CustomResourceBuilder {
    return new CustomResourceBuilder({ ...this.state, namespace }, this.inflector);
  }

  build(): ResourceDescriptor {
    const { kind, group, version, namespace } = this.state;

    if (version === undefined) {
      throw new ResourceDefinitionError(`${kind} must have a version`, kind, 'version', [
        `Call .version('v1') before .build()`,
      ]);
    }
    if (group === undefined) {
      throw new ResourceDefinitionError(`${kind} must have a group`, kind, 'group', [
        `Call .group('example.com') before .build(), or .group('') for the core group`,
      ]);
    }

    return assembleDescriptor(
      { kind, group, version, ...(namespace !== undefined && { namespace }) },
      this.inflector
    );
  }
}

/**
 * Start building a descriptor for a resource kind.
 *
 * Throws {@link ResourceDefinitionError} immediately when the kind is empty,
 * not PascalCase, or already plural.
 */
export function customResource(kind: string, options?: DescriptorOptions): CustomResourceBuilder {
  return CustomResourceBuilder.forKind(kind, options);
}

/**
 * Build a descriptor from a complete identity in one step.
 */
export function defineResource(
  identity: ResourceIdentity,
  options: DescriptorOptions = {}
): ResourceDescriptor {
  const inflector = options.inflector ?? englishInflector;
  assertValidKind(identity.kind, inflector);
  return assembleDescriptor(identity, inflector);
}
