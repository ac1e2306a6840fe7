// Navigation menu structure and helpers

import type { AdminUser } from '@/sites/types';

/**
 * `'super'` requires a superuser; a string is a permission code; a function
 * decides for the user.
 */
export type MenuPermission = string | ((user: AdminUser) => boolean);

export interface NavMenuItem {
  title: string;
  url?: string;
  icon?: string | null;
  perm?: MenuPermission;
  menus?: NavMenuItem[];
  selected?: boolean;
}

export function capfirst(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Upper-case the first letter of every word and lower-case the rest,
 * where a word is a run of letters (`my_app` -> `My_App`).
 */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

export function compareTitles(a: NavMenuItem, b: NavMenuItem): number {
  if (a.title < b.title) {
    return -1;
  }
  return a.title > b.title ? 1 : 0;
}

/**
 * Collect every URL in a menu tree.
 */
export function collectMenuUrls(items: readonly NavMenuItem[], urls: Set<string> = new Set()): Set<string> {
  for (const item of items) {
    if (item.url !== undefined) {
      urls.add(item.url);
    }
    if (item.menus) {
      collectMenuUrls(item.menus, urls);
    }
  }
  return urls;
}

export function checkMenuPermission(item: NavMenuItem, user: AdminUser): boolean {
  const { perm } = item;
  if (perm === undefined) {
    return true;
  }
  if (typeof perm === 'function') {
    return perm(user);
  }
  if (perm === 'super') {
    return user.isSuperuser;
  }
  return user.hasPerm(perm);
}

/**
 * Copy of the menu tree keeping only the items the user may see, without
 * their `perm` entries. Groups whose children were all removed are dropped;
 * items that never had children are kept.
 */
export function filterMenuForUser(items: readonly NavMenuItem[], user: AdminUser): NavMenuItem[] {
  const visible: NavMenuItem[] = [];
  for (const item of items) {
    if (!checkMenuPermission(item, user)) {
      continue;
    }
    const { perm: _perm, menus, ...rest } = item;
    if (menus === undefined) {
      visible.push(rest);
      continue;
    }
    const children = filterMenuForUser(menus, user);
    if (children.length > 0) {
      visible.push({ ...rest, menus: children });
    }
  }
  return visible;
}

/**
 * Flag every item whose URL prefixes `path`, and every ancestor of one.
 * @returns whether anything in `item`'s subtree was selected
 */
export function markSelected(item: NavMenuItem, path: string): boolean {
  let selected = item.url !== undefined && path.startsWith(item.url);
  for (const child of item.menus ?? []) {
    if (markSelected(child, path)) {
      selected = true;
    }
  }
  if (selected) {
    item.selected = true;
  }
  return selected;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

export function isNavMenuItem(value: unknown): value is NavMenuItem {
  if (!isRecord(value) || typeof value.title !== 'string') {
    return false;
  }
  if (!isOptionalString(value.url) || !(value.icon === null || isOptionalString(value.icon))) {
    return false;
  }
  if (value.selected !== undefined && typeof value.selected !== 'boolean') {
    return false;
  }
  return value.menus === undefined || (Array.isArray(value.menus) && value.menus.every(isNavMenuItem));
}

/**
 * Parse a menu serialized with JSON.stringify; `undefined` when it does not
 * have the menu's shape.
 */
export function parseNavMenu(serialized: string): NavMenuItem[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch {
    return undefined;
  }
  return Array.isArray(parsed) && parsed.every(isNavMenuItem) ? parsed : undefined;
}
