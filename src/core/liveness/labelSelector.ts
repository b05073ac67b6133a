// src/core/liveness/labelSelector.ts
//
// Compiles a metav1.LabelSelector into a predicate over label sets.
// A missing selector matches nothing; an empty one matches everything.

import { KubePruneError } from '../../shared/errorHandle.js';
import type { LabelSelector } from '../kubernetes/resourceSchema.js';

export type Labels = Readonly<Record<string, string>>;

type SelectorOperator = 'In' | 'NotIn' | 'Exists' | 'DoesNotExist';

interface Requirement {
  key: string;
  operator: SelectorOperator;
  values: ReadonlySet<string>;
}

export interface LabelSelectorMatcher {
  /** True when the selector places no constraint at all. */
  readonly matchesEverything: boolean;
  matches(labels: Labels | undefined): boolean;
  /** Kubernetes-style selector string, e.g. `app=web,tier in (a,b)`. */
  toString(): string;
}

export class LabelSelectorSyntaxError extends KubePruneError {
  constructor(message: string) {
    super(message, 422);
    this.name = 'LabelSelectorSyntaxError';
    Object.setPrototypeOf(this, LabelSelectorSyntaxError.prototype);
  }
}

const NAME_MAX_LENGTH = 63;
const PREFIX_MAX_LENGTH = 253;
const namePattern = /^([A-Za-z0-9][-A-Za-z0-9_.]*)?[A-Za-z0-9]$/;
const dnsSubdomainPattern = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;

const validateKey = (key: string): void => {
  const parts = key.split('/');
  if (parts.length > 2) {
    throw new LabelSelectorSyntaxError(`key "${key}": a qualified name may contain at most one '/'`);
  }

  const name = parts.length === 2 ? parts[1] : parts[0];
  if (parts.length === 2) {
    const prefix = parts[0];
    if (prefix.length === 0) {
      throw new LabelSelectorSyntaxError(`key "${key}": prefix part must be non-empty`);
    }
    if (prefix.length > PREFIX_MAX_LENGTH || !dnsSubdomainPattern.test(prefix)) {
      throw new LabelSelectorSyntaxError(`key "${key}": prefix part must be a DNS-1123 subdomain`);
    }
  }

  if (name.length === 0) {
    throw new LabelSelectorSyntaxError(`key "${key}": name part must be non-empty`);
  }
  if (name.length > NAME_MAX_LENGTH) {
    throw new LabelSelectorSyntaxError(`key "${key}": name part must be no more than ${NAME_MAX_LENGTH} characters`);
  }
  if (!namePattern.test(name)) {
    throw new LabelSelectorSyntaxError(
      `key "${key}": name part must consist of alphanumeric characters, '-', '_' or '.', and must start and end with an alphanumeric character`,
    );
  }
};

const validateValue = (key: string, value: string): void => {
  // Empty values are legal
  if (value.length === 0) {
    return;
  }
  if (value.length > NAME_MAX_LENGTH) {
    throw new LabelSelectorSyntaxError(
      `value "${value}" for key "${key}": must be no more than ${NAME_MAX_LENGTH} characters`,
    );
  }
  if (!namePattern.test(value)) {
    throw new LabelSelectorSyntaxError(
      `value "${value}" for key "${key}": must consist of alphanumeric characters, '-', '_' or '.', and must start and end with an alphanumeric character`,
    );
  }
};

const toOperator = (key: string, operator: string): SelectorOperator => {
  switch (operator) {
    case 'In':
    case 'NotIn':
    case 'Exists':
    case 'DoesNotExist':
      return operator;
    default:
      throw new LabelSelectorSyntaxError(`key "${key}": "${operator}" is not a valid label selector operator`);
  }
};

const newRequirement = (key: string, rawOperator: string, values: readonly string[]): Requirement => {
  validateKey(key);
  const operator = toOperator(key, rawOperator);

  switch (operator) {
    case 'In':
    case 'NotIn':
      if (values.length === 0) {
        throw new LabelSelectorSyntaxError(`key "${key}": for 'In', 'NotIn' operators, values set can't be empty`);
      }
      break;
    case 'Exists':
    case 'DoesNotExist':
      if (values.length !== 0) {
        throw new LabelSelectorSyntaxError(
          `key "${key}": values set must be empty for 'Exists', 'DoesNotExist'`,
        );
      }
      break;
  }

  for (const value of values) {
    validateValue(key, value);
  }

  return { key, operator, values: new Set(values) };
};

const requirementMatches = (requirement: Requirement, labels: Labels): boolean => {
  const present = Object.prototype.hasOwnProperty.call(labels, requirement.key);
  switch (requirement.operator) {
    case 'In':
      return present && requirement.values.has(labels[requirement.key]);
    case 'NotIn':
      return !present || !requirement.values.has(labels[requirement.key]);
    case 'Exists':
      return present;
    case 'DoesNotExist':
      return !present;
  }
};

const formatRequirement = (requirement: Requirement): string => {
  const values = [...requirement.values].sort();
  switch (requirement.operator) {
    case 'In':
      return values.length === 1 ? `${requirement.key}=${values[0]}` : `${requirement.key} in (${values.join(',')})`;
    case 'NotIn':
      return `${requirement.key} notin (${values.join(',')})`;
    case 'Exists':
      return requirement.key;
    case 'DoesNotExist':
      return `!${requirement.key}`;
  }
};

const nothingMatcher: LabelSelectorMatcher = {
  matchesEverything: false,
  matches: () => false,
  toString: () => '<none>',
};

/**
 * Compiles a label selector.
 *
 * @param selector - The selector as found on a PodDisruptionBudget spec. `undefined` and `null` select nothing.
 * @throws LabelSelectorSyntaxError for invalid keys, values or operators.
 */
export const compileLabelSelector = (selector: LabelSelector | null | undefined): LabelSelectorMatcher => {
  if (selector === null || selector === undefined) {
    return nothingMatcher;
  }

  const requirements: Requirement[] = [];

  for (const [key, value] of Object.entries(selector.matchLabels ?? {})) {
    requirements.push(newRequirement(key, 'In', [value]));
  }
  for (const expression of selector.matchExpressions ?? []) {
    requirements.push(newRequirement(expression.key, expression.operator, expression.values ?? []));
  }

  requirements.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  const frozen: readonly Requirement[] = Object.freeze(requirements);

  return {
    matchesEverything: frozen.length === 0,
    matches: (labels) => frozen.every((requirement) => requirementMatches(requirement, labels ?? {})),
    toString: () => frozen.map(formatRequirement).join(','),
  };
};
