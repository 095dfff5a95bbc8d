import * as cheerio from 'cheerio';

/**
 * Whether the page renders the login form. Text that merely mentions the
 * form (a bookmark title, say) does not count.
 */
export function hasLoginForm(html: string, selector: string): boolean {
  return cheerio.load(html)(selector).length > 0;
}
