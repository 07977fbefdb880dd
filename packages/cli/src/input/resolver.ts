/**
 * Input Resolution
 *
 * A parameter's value comes from the command line when it was given
 * there, otherwise from a prompt, otherwise from its default. Whatever is
 * resolved is written back into the invocation's arguments.
 */

import { InvalidInputError } from '../errors';

export type ParameterSource = 'explicit' | 'prompted' | 'default';

export interface ResolvedParameter<T extends string | null = string> {
  name: string;
  value: T;
  source: ParameterSource | null;
}

export type InvocationArgs = Record<string, unknown>;

export type PromptFn = () => Promise<string | null>;

export interface ResolveOptions {
  name: string;
  args: InvocationArgs;
  prompt?: PromptFn;
  allowed?: readonly string[];
  defaultValue?: string;
  required?: boolean;
}

export interface EnumResolveOptions extends ResolveOptions {
  allowed: readonly string[];
}

/**
 * Throw InvalidInputError when value is not one of allowed
 */
export function assertAllowed(name: string, value: string, allowed?: readonly string[]): void {
  if (allowed && !allowed.includes(value)) {
    throw InvalidInputError.notAllowed(name, value, allowed);
  }
}

/**
 * Non-empty string given for name, or null
 */
export function readExplicitValue(args: InvocationArgs, name: string): string | null {
  const value = args[name];
  if (typeof value === 'string' && value.trim().length > 0) {
    return value;
  }
  return null;
}

export async function resolveInput(options: ResolveOptions & { required: true }): Promise<ResolvedParameter<string>>;
export async function resolveInput(options: ResolveOptions): Promise<ResolvedParameter<string | null>>;
export async function resolveInput(options: ResolveOptions): Promise<ResolvedParameter<string | null>> {
  const { name, args, prompt, allowed, defaultValue, required } = options;

  let resolved: ResolvedParameter<string | null>;

  const explicit = readExplicitValue(args, name);
  if (explicit !== null) {
    assertAllowed(name, explicit, allowed);
    resolved = { name, value: explicit, source: 'explicit' };
  } else {
    const answer = prompt ? await prompt() : null;
    const trimmed = answer ? answer.trim() : '';

    if (trimmed.length > 0) {
      assertAllowed(name, trimmed, allowed);
      resolved = { name, value: trimmed, source: 'prompted' };
    } else if (defaultValue !== undefined) {
      resolved = { name, value: defaultValue, source: 'default' };
    } else if (required) {
      throw InvalidInputError.missing(name);
    } else {
      resolved = { name, value: null, source: null };
    }
  }

  if (resolved.value !== null) {
    args[name] = resolved.value;
  }
  return resolved;
}

/**
 * Resolve a parameter restricted to a fixed set of choices
 */
export async function resolveEnumInput(
  options: EnumResolveOptions & { required: true }
): Promise<ResolvedParameter<string>>;
export async function resolveEnumInput(options: EnumResolveOptions): Promise<ResolvedParameter<string | null>>;
export async function resolveEnumInput(options: EnumResolveOptions): Promise<ResolvedParameter<string | null>> {
  return resolveInput(options);
}
