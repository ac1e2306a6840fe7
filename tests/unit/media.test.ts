import { describe, expect, it } from 'vitest';
import { Media } from '@/views/Media';

describe('Media', () => {
  it('is empty by default', () => {
    expect(new Media().isEmpty).toBe(true);
  });

  it('merges in order without duplicates', () => {
    const base = new Media({ css: { all: ['admin.css'] }, js: ['jquery.js', 'admin.js'] });

    const merged = base.merge({ js: ['admin.js', 'list.js'] }, new Media({ css: { all: ['admin.css', 'list.css'], print: ['print.css'] } }));

    expect(merged.js).toEqual(['jquery.js', 'admin.js', 'list.js']);
    expect(merged.css).toEqual({ all: ['admin.css', 'list.css'], print: ['print.css'] });
  });

  it('leaves the merged instances unchanged', () => {
    const base = new Media({ js: ['admin.js'] });

    base.merge({ js: ['other.js'] });

    expect(base.js).toEqual(['admin.js']);
  });

  it('renders stylesheets before scripts', () => {
    const media = new Media({ js: ['admin.js', 'https://cdn.example.com/lib.js'], css: { screen: ['/site.css'] } });

    expect(media.render((path) => `/static/${path}`)).toBe(
      [
        '<link href="/site.css" type="text/css" media="screen" rel="stylesheet" />',
        '<script type="text/javascript" src="/static/admin.js"></script>',
        '<script type="text/javascript" src="https://cdn.example.com/lib.js"></script>',
      ].join('\n'),
    );
  });
});
