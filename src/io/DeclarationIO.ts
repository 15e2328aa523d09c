/**
 * DeclarationIO - reads the declared links file
 *
 * ```yaml
 * lab: /folder/lab.unl
 * links:
 *   r1-r2:
 *     source: { node: 1, port: e0 }
 *     target: { node: 2, port: e0 }
 *   r1-uplink:
 *     source: { node: 1, port: e1 }
 *     network: 3
 * ```
 */

import * as YAML from 'yaml';

import linksSchema from '../../schema/links.schema.json';
import { LinkError } from '../reconciler/errors';
import type { LinkStyle } from '../types/lab';
import type { LinkDeclaration } from '../types/links';
import { createAjv, formatSchemaErrors } from '../utilities/schemaValidation';
import type { FileSystemAdapter } from './types';

export interface EndpointDoc {
  node: number;
  port: string;
}

export interface LinkDoc {
  source: EndpointDoc;
  target?: EndpointDoc;
  network?: number;
  style?: Partial<LinkStyle>;
}

export interface DeclarationDoc {
  lab: string;
  links: Record<string, LinkDoc>;
}

/** Declared links keyed by their name */
export type DeclaredLinks = Record<string, LinkDeclaration>;

const validateDeclarations = createAjv().compile<DeclarationDoc>(linksSchema);

export function toDeclaration(labPath: string, doc: LinkDoc): LinkDeclaration {
  const decl: LinkDeclaration = {
    labPath,
    source: { nodeId: doc.source.node, port: doc.source.port },
  };
  if (doc.target) decl.target = { nodeId: doc.target.node, port: doc.target.port };
  if (doc.network !== undefined) decl.networkId = doc.network;
  if (doc.style) decl.style = { ...doc.style };
  return decl;
}

/**
 * Parse and validate declarations.
 *
 * @param origin - file name used in error messages
 * @throws LinkError INVALID_DECLARATION
 */
export function parseDeclarations(content: string, origin = 'declarations'): DeclaredLinks {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new LinkError('INVALID_DECLARATION', `${origin}: ${message}`);
  }

  if (!validateDeclarations(parsed)) {
    throw new LinkError('INVALID_DECLARATION', `${origin}: ${formatSchemaErrors(validateDeclarations.errors)}`);
  }

  const declared: DeclaredLinks = {};
  for (const [name, link] of Object.entries(parsed.links)) {
    declared[name] = toDeclaration(parsed.lab, link);
  }
  return declared;
}

export async function loadDeclarations(fs: FileSystemAdapter, filePath: string): Promise<DeclaredLinks> {
  const content = await fs.readFile(filePath);
  return parseDeclarations(content, filePath);
}
