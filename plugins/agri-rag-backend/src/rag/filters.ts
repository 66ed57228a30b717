/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Metadata filters for category, source and filename scoping
 *
 * @packageDocumentation
 */

import { InvalidCategoryError } from '../errors';
import {
  AgriCategory,
  CATEGORY_DESCRIPTIONS,
  FilterCondition,
  FilterExpr,
  FilterOptions,
  RecordMetadata,
  isCategory,
} from '../models';

/**
 * Build a store filter from the requested conditions.
 * Category is an exact match; source and filename are substring matches.
 * Returns null when no condition is given.
 */
export function buildFilter(options: FilterOptions = {}): FilterExpr | null {
  const conditions: FilterCondition[] = [];

  if (options.category) {
    assertCategory(options.category);
    conditions.push({ category: { $eq: options.category } });
  }

  if (options.source) {
    conditions.push({ source: { $contains: options.source } });
  }

  if (options.filename) {
    conditions.push({ filename: { $contains: options.filename } });
  }

  if (conditions.length === 0) {
    return null;
  }

  if (conditions.length === 1) {
    return conditions[0];
  }

  return { $and: conditions };
}

export function validateCategory(category: string): boolean {
  return isCategory(category);
}

export function assertCategory(category: string): asserts category is AgriCategory {
  if (!isCategory(category)) {
    throw new InvalidCategoryError(category);
  }
}

export function getCategoryDescription(category: string): string {
  return isCategory(category) ? CATEGORY_DESCRIPTIONS[category] : 'Unknown category';
}

/**
 * Split a filter into its flat list of conditions
 */
export function filterConditions(filter: FilterExpr): FilterCondition[] {
  return '$and' in filter ? filter.$and : [filter];
}

function matchesCondition(metadata: RecordMetadata, condition: FilterCondition): boolean {
  if ('category' in condition) {
    return metadata.category === condition.category.$eq;
  }
  if ('source' in condition) {
    return metadata.source.includes(condition.source.$contains);
  }
  return metadata.filename.includes(condition.filename.$contains);
}

/**
 * Evaluate a filter against record metadata, for stores that filter in memory
 */
export function matchesFilter(metadata: RecordMetadata, filter?: FilterExpr | null): boolean {
  if (!filter) {
    return true;
  }
  return filterConditions(filter).every(condition => matchesCondition(metadata, condition));
}
