/**
 * wireline - URL helpers for crawling
 */

export class UrlUtils {
  /**
   * Number of path segments below the host, e.g. 2 for
   * "http://rit.edu/study/undergraduate". The input is always read as an
   * absolute URL, so a relative one yields a meaningless, possibly
   * negative, value.
   */
  static depth(url: string): number {
    const segments = url.split("/");
    if (segments[segments.length - 1] === "") {
      segments.pop();
    }
    return segments.length - 3;
  }

  /**
   * Loose domain check: true when `domain` appears anywhere in the URL
   */
  static inDomain(url: string, domain: string): boolean {
    return url.includes(domain);
  }
}
