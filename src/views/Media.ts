// Static assets (stylesheets and scripts) a view needs

export interface MediaDefinition {
  /** Stylesheets keyed by media type, e.g. `{ all: ['admin.css'] }` */
  css?: Readonly<Record<string, readonly string[]>>;
  js?: readonly string[];
}

function appendUnique(target: string[], paths: readonly string[]): void {
  for (const path of paths) {
    if (!target.includes(path)) {
      target.push(path);
    }
  }
}

function isAbsolute(path: string): boolean {
  return path.startsWith('/') || /^https?:\/\//.test(path);
}

/**
 * Immutable set of asset paths. `merge` returns a new instance; order is kept
 * and repeated paths are dropped.
 */
export class Media {
  private readonly cssByMedium = new Map<string, string[]>();
  private readonly jsPaths: string[] = [];

  constructor(definition: MediaDefinition = {}) {
    for (const [medium, paths] of Object.entries(definition.css ?? {})) {
      appendUnique(this.cssFor(medium), paths);
    }
    appendUnique(this.jsPaths, definition.js ?? []);
  }

  private cssFor(medium: string): string[] {
    const existing = this.cssByMedium.get(medium);
    if (existing) {
      return existing;
    }
    const created: string[] = [];
    this.cssByMedium.set(medium, created);
    return created;
  }

  get css(): Record<string, readonly string[]> {
    return Object.fromEntries(Array.from(this.cssByMedium, ([medium, paths]) => [medium, [...paths]]));
  }

  get js(): readonly string[] {
    return [...this.jsPaths];
  }

  get isEmpty(): boolean {
    return this.jsPaths.length === 0 && this.cssByMedium.size === 0;
  }

  merge(...others: Array<Media | MediaDefinition>): Media {
    const merged = new Media({ css: this.css, js: this.jsPaths });
    for (const other of others) {
      const media = other instanceof Media ? other : new Media(other);
      for (const [medium, paths] of media.cssByMedium) {
        appendUnique(merged.cssFor(medium), paths);
      }
      appendUnique(merged.jsPaths, media.jsPaths);
    }
    return merged;
  }

  /**
   * HTML tags for the assets, stylesheets first. Relative paths go through
   * `resolve`; absolute paths and full URLs are used as they are.
   */
  render(resolve: (path: string) => string = (path) => path): string {
    const url = (path: string): string => (isAbsolute(path) ? path : resolve(path));
    const tags: string[] = [];
    for (const [medium, paths] of this.cssByMedium) {
      for (const path of paths) {
        tags.push(`<link href="${url(path)}" type="text/css" media="${medium}" rel="stylesheet" />`);
      }
    }
    for (const path of this.jsPaths) {
      tags.push(`<script type="text/javascript" src="${url(path)}"></script>`);
    }
    return tags.join('\n');
  }
}
