import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { DEFAULT_BACKEND } from '../engine/types.js';

const ResourceDeclarationSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.string().regex(/^[a-z][a-z0-9_]*$/, 'must be a snake_case resource type name'),
  // Subject of the resource; host-wide resources such as system_info take none
  name: z.string().default(''),
  checks: z.record(z.string(), z.unknown()).default({}),
});

const DeclarationDocumentSchema = z.object({
  backend: z.string().min(1).default(DEFAULT_BACKEND),
  resources: z.array(ResourceDeclarationSchema).min(1),
});

export type ResourceDeclaration = z.infer<typeof ResourceDeclarationSchema>;
export type DeclarationDocument = z.infer<typeof DeclarationDocumentSchema>;

export function parseDeclarations(content: string): DeclarationDocument {
  const raw: unknown = yaml.parse(content);

  const result = DeclarationDocumentSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config:\n${errors}`);
  }

  return result.data;
}

export function loadDeclarations(configPath: string): DeclarationDocument {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  return parseDeclarations(fs.readFileSync(configPath, 'utf-8'));
}

export function declarationId(declaration: ResourceDeclaration): string {
  return declaration.id ?? (declaration.name ? `${declaration.type} ${declaration.name}` : declaration.type);
}
