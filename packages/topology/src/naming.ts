/**
 * Naming utilities for nodes and image references.
 *
 * Image references follow the registry/repository:tag grammar used by
 * container registries. Templates use `{parameter}` placeholders.
 */

import { ConfigurationError } from './errors.js';
import type { ImageTemplate } from './schema.js';

const PLACEHOLDER = /\{([A-Za-z0-9_-]+)\}/g;

const REGISTRY_PATTERN =
  /^[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?)*(?::\d+)?$/;
const PATH_COMPONENT_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG_PATTERN = /^[\w][\w.-]{0,127}$/;
const HOSTNAME_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

export interface ImageReference {
  registry?: string;
  repository: string;
  tag?: string;
}

/**
 * List the parameter names a template refers to.
 */
export function getTemplateParameters(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), match => match[1]);
}

/**
 * Substitute `{parameter}` placeholders.
 * Throws ConfigurationError on a placeholder with no value.
 */
export function renderTemplate(
  template: string,
  parameters: Readonly<Record<string, string>>,
  path?: string
): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = Object.hasOwn(parameters, name) ? parameters[name] : undefined;
    if (value === undefined) {
      throw new ConfigurationError(`unknown parameter "${name}" in template "${template}"`, {
        path,
        value: template,
      });
    }
    return value;
  });
}

/**
 * Render an image template into a full image reference.
 * Pattern: [${registry}/]${repository}:${tag}
 */
export function renderImageReference(
  image: ImageTemplate,
  parameters: Readonly<Record<string, string>>,
  path?: string
): string {
  const registry = image.registry ? renderTemplate(image.registry, parameters, path) : '';
  const repository = renderTemplate(image.repository, parameters, path);
  const tag = renderTemplate(image.tag, parameters, path);

  const reference = `${registry ? `${registry}/` : ''}${repository}:${tag}`;

  if (!isValidImageReference(reference)) {
    throw new ConfigurationError(`invalid image reference "${reference}"`, {
      path,
      value: reference,
    });
  }

  return reference;
}

/**
 * Split an image reference into registry, repository and tag.
 * Returns null when it does not parse.
 */
export function parseImageReference(reference: string): ImageReference | null {
  const lastSlash = reference.lastIndexOf('/');
  const lastColon = reference.lastIndexOf(':');

  let name = reference;
  let tag: string | undefined;
  if (lastColon > lastSlash) {
    name = reference.slice(0, lastColon);
    tag = reference.slice(lastColon + 1);
    if (!TAG_PATTERN.test(tag)) return null;
  }

  const parts = name.split('/');
  let registry: string | undefined;
  if (parts.length > 1 && isRegistryHost(parts[0])) {
    registry = parts.shift();
    if (registry === undefined || !REGISTRY_PATTERN.test(registry)) return null;
  }

  if (parts.length === 0 || !parts.every(part => PATH_COMPONENT_PATTERN.test(part))) {
    return null;
  }

  return { registry, repository: parts.join('/'), tag };
}

export function isValidImageReference(reference: string): boolean {
  return parseImageReference(reference) !== null;
}

/**
 * Node hostnames are single DNS labels: lowercase alphanumeric with hyphens, 1-63 chars
 */
export function isValidHostname(hostname: string): boolean {
  return HOSTNAME_PATTERN.test(hostname);
}

/**
 * Get a compose service name for a node.
 * Pattern: hostname with hyphens replaced by underscores
 */
export function getComposeServiceName(hostname: string): string {
  return hostname.replace(/-/g, '_');
}

function isRegistryHost(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}
