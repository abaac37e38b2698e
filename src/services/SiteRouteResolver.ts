import { RouteParams, RouteResolver } from '../types';
import { RouteResolutionError } from '../errors';

export const DEFAULT_ROUTES: Readonly<Record<string, string>> = {
    home: '/',
    about: '/about',
    contact: '/contact',
    sitemapXml: '/sitemap.xml',
    robotsTxt: '/robots.txt',
};

/**
 * Resolves named routes to absolute URLs on the configured site. Path
 * templates may contain `:name` segments, filled from `params`.
 */
export class SiteRouteResolver implements RouteResolver {
    private readonly routes: Record<string, string>;

    constructor(
        private readonly siteUrl: string,
        extraRoutes: Record<string, string> = {}
    ) {
        this.routes = { ...DEFAULT_ROUTES, ...extraRoutes };
    }

    routeToAbsoluteUrl(route: string, params: RouteParams = {}): string {
        const template = this.routes[route];
        if (template === undefined) {
            throw new RouteResolutionError(`Unknown route: ${route}`);
        }

        const path = template.replace(/:([A-Za-z_][A-Za-z0-9_]*)/g, (_, name: string) => {
            const value = params[name];
            if (value === undefined) {
                throw new RouteResolutionError(`Missing parameter "${name}" for route ${route}`);
            }
            return encodeURIComponent(String(value));
        });

        try {
            return new URL(path, this.siteUrl).toString();
        } catch {
            throw new RouteResolutionError(`Cannot build an absolute URL for route ${route} on ${this.siteUrl}`);
        }
    }
}
