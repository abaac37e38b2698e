export class RouteResolutionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RouteResolutionError';
    }
}

export class SitemapEntryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SitemapEntryError';
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
