import { MAX_DESCRIPTION_LENGTH, MAX_NAME_LENGTH } from '../constants/proxy.js';

export type ManifestIssueKind =
  | 'MissingName'
  | 'InvalidNameFormat'
  | 'DoubledHyphen'
  | 'NameTooLong'
  | 'MissingDescription'
  | 'DescriptionTooLong'
  | 'MalformedManifest'
  | 'NameChanged';

export interface ManifestIssue {
  kind: ManifestIssueKind;
  field: 'name' | 'description' | 'frontmatter';
  message: string;
}

const NAME_PATTERN = /^[a-z0-9]$|^[a-z0-9][a-z0-9-]*[a-z0-9]$/;

/**
 * Checks a skill manifest's name and description.
 *
 * Both fields are always checked; within a field only the first failing rule
 * is reported. An empty result means the manifest may be proxied.
 */
export function validateManifest(manifest: Record<string, unknown>): ManifestIssue[] {
  const issues: ManifestIssue[] = [];

  const nameIssue = checkName(manifest.name);
  if (nameIssue) {
    issues.push(nameIssue);
  }

  const descriptionIssue = checkDescription(manifest.description);
  if (descriptionIssue) {
    issues.push(descriptionIssue);
  }

  return issues;
}

/**
 * Description as a string, or undefined when absent or blank.
 * A number YAML typed is stringified; a boolean counts as missing.
 */
export function descriptionText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim().length > 0 ? value : undefined;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

/** Length in Unicode code points, so an emoji counts once. */
export function characterCount(text: string): number {
  return [...text].length;
}

export function formatIssue(issue: ManifestIssue): string {
  return `${issue.field}: ${issue.message}`;
}

function checkName(value: unknown): ManifestIssue | null {
  if (value === undefined || value === null || value === '') {
    return { kind: 'MissingName', field: 'name', message: "missing 'name'" };
  }
  if (typeof value !== 'string' || !NAME_PATTERN.test(value)) {
    return {
      kind: 'InvalidNameFormat',
      field: 'name',
      message: `invalid name format: ${JSON.stringify(value)} (lowercase letters, digits and hyphens; no leading or trailing hyphen)`,
    };
  }
  if (value.includes('--')) {
    return { kind: 'DoubledHyphen', field: 'name', message: `consecutive hyphens in name: "${value}"` };
  }
  if (value.length > MAX_NAME_LENGTH) {
    return {
      kind: 'NameTooLong',
      field: 'name',
      message: `name is ${value.length} characters, maximum is ${MAX_NAME_LENGTH}`,
    };
  }
  return null;
}

function checkDescription(value: unknown): ManifestIssue | null {
  const text = descriptionText(value);
  if (text === undefined) {
    return { kind: 'MissingDescription', field: 'description', message: "missing 'description'" };
  }
  const length = characterCount(text);
  if (length > MAX_DESCRIPTION_LENGTH) {
    return {
      kind: 'DescriptionTooLong',
      field: 'description',
      message: `description is ${length} characters, maximum is ${MAX_DESCRIPTION_LENGTH}`,
    };
  }
  return null;
}
