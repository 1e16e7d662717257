/**
 * Message template rendering
 */

export const RESOURCE_PLACEHOLDER = '%%RESOURCE%%';
export const ROLE_PLACEHOLDER = '%%ROLE%%';

export const DEFAULT_UP_MESSAGE = `${RESOURCE_PLACEHOLDER} is back online, ${ROLE_PLACEHOLDER}!`;
export const DEFAULT_DOWN_MESSAGE = `${RESOURCE_PLACEHOLDER} is down, ${ROLE_PLACEHOLDER}.`;

const PLACEHOLDER_PATTERN = /%%(RESOURCE|ROLE)%%/g;

/**
 * Substitute both placeholders in a single pass, so a resource name that
 * happens to contain `%%ROLE%%` is left as written.
 */
export function renderTemplate(template: string, resourceName: string, roleMention: string): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, key: string) =>
    key === 'RESOURCE' ? resourceName : roleMention
  );
}
