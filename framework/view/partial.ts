/**
 * Partial Resolution
 *
 * Turns a partial request into the arguments of a template engine render
 * call: the engine-facing template id, the locals, and the render options.
 * Nothing here touches the engine or the file system.
 *
 * @example
 * const resolver = new PartialResolver();
 * resolver.resolve('greeting', value('Hello'));
 * // { engineTemplateId: '_greeting', locals: { greeting: 'Hello' }, renderOptions: { layout: false } }
 */

import { InvalidCollectionError, InvalidTemplateNameError } from './errors.ts';
import type { RenderOptions } from './template.ts';

export type NamingConvention = 'direct' | 'underscore-prefixed';

export type Locals = Record<string, unknown>;

/**
 * Explicit locals or a single value exposed under the partial's own name
 */
export type PartialInput =
  | { readonly kind: 'locals'; readonly locals: Locals }
  | { readonly kind: 'value'; readonly value: unknown };

export type PartialOptions = RenderOptions;

export interface CollectionOptions extends RenderOptions {
  collection: Iterable<unknown>;
  /** Shared locals for every member */
  locals?: Locals;
}

export interface PartialDescriptor {
  readonly engineTemplateId: string;
  readonly locals: Locals;
  readonly renderOptions: RenderOptions & { layout: false };
}

export interface PartialResolverOptions {
  naming?: NamingConvention;
}

const SEGMENT_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_-]*$/;

/**
 * Pass a mapping as the partial's locals
 */
export function locals(mapping: Locals): PartialInput {
  return { kind: 'locals', locals: mapping };
}

/**
 * Expose one value inside the partial under the partial's name
 */
export function value(v: unknown): PartialInput {
  return { kind: 'value', value: v };
}

export class PartialResolver {
  readonly naming: NamingConvention;

  constructor(options: PartialResolverOptions = {}) {
    this.naming = options.naming ?? 'underscore-prefixed';
  }

  /**
   * Resolve a single partial render
   */
  resolve(name: string, input?: PartialInput, options: PartialOptions = {}): PartialDescriptor {
    const segments = this.parseName(name);

    return {
      engineTemplateId: this.applyNaming(segments),
      locals: this.buildLocals(segments, input),
      renderOptions: { ...options, layout: false },
    };
  }

  /**
   * Resolve one render per collection member, in collection order
   */
  resolveCollection(name: string, options: CollectionOptions): PartialDescriptor[] {
    const segments = this.parseName(name);
    const { collection, locals: shared = {}, ...engineOptions } = options;

    if (!isCollection(collection)) {
      throw new InvalidCollectionError(name, collection);
    }

    const engineTemplateId = this.applyNaming(segments);
    const localName = segments[segments.length - 1];

    return Array.from(collection, (member) => ({
      engineTemplateId,
      locals: { ...shared, [localName]: member },
      renderOptions: { ...engineOptions, layout: false },
    }));
  }

  templateIdFor(name: string): string {
    return this.applyNaming(this.parseName(name));
  }

  /**
   * Variable name a single value is bound to inside the partial
   */
  localNameFor(name: string): string {
    const segments = this.parseName(name);
    return segments[segments.length - 1];
  }

  private parseName(name: unknown): string[] {
    if (typeof name !== 'string' || name.length === 0) {
      throw new InvalidTemplateNameError(name);
    }

    const segments = name.split('/');
    if (!segments.every((segment) => SEGMENT_PATTERN.test(segment))) {
      throw new InvalidTemplateNameError(name);
    }

    return segments;
  }

  private applyNaming(segments: string[]): string {
    if (this.naming === 'direct') {
      return segments.join('/');
    }

    const last = segments.length - 1;
    return segments.map((segment, i) => (i === last ? `_${segment}` : segment)).join('/');
  }

  private buildLocals(segments: string[], input: PartialInput | undefined): Locals {
    if (!input) return {};

    switch (input.kind) {
      case 'locals':
        return input.locals;
      case 'value':
        return { [segments[segments.length - 1]]: input.value };
    }
  }
}

export function isCollection(candidate: unknown): candidate is Iterable<unknown> {
  if (Array.isArray(candidate)) return true;
  if (candidate === null || typeof candidate !== 'object') return false;
  return Symbol.iterator in candidate && typeof candidate[Symbol.iterator] === 'function';
}
