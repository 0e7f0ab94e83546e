/**
 * Validation utilities for YAML configuration files
 * Provides user-friendly error messages and formatting
 */

import { z } from 'zod';
import chalk from 'chalk';
import { InventorySchema, type Inventory } from './inventory.schema';
import type { Result } from '../types';
import { ok, err } from '../types';

/**
 * Validation error with path and message
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Format Zod path to readable string
 */
export function formatPath(path: PropertyKey[]): string {
  if (path.length === 0) return 'root';
  
  return path.map((segment, index) => {
    if (typeof segment === 'number') {
      return `[${segment}]`;
    }
    if (typeof segment === 'symbol') {
      return `[Symbol(${segment.description ?? ''})]`;
    }
    return index === 0 ? segment : `.${segment}`;
  }).join('');
}

/**
 * Transform Zod errors to ValidationIssues
 */
function transformZodErrors(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format validation errors for console output
 */
export function formatValidationErrors(errors: ValidationIssue[], fileName: string): string {
  const lines: string[] = [
    '',
    chalk.red.bold(`✗ Validation failed for ${fileName}`),
    '',
  ];

  for (const error of errors) {
    lines.push(chalk.yellow(`  → ${error.path}`));
    lines.push(chalk.white(`    ${error.message}`));
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Validate nodes.yml content
 */
export function validateInventory(data: unknown): Result<Inventory, ValidationIssue[]> {
  const result = InventorySchema.safeParse(data);
  
  if (result.success) {
    return ok(result.data);
  }
  
  return err(transformZodErrors(result.error));
}
