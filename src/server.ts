import "reflect-metadata";
import "dotenv/config";
import { AppDataSource } from './config/database';
import { loadSettings } from './config/settings';
import { Profile } from './entities/Profile';
import { createApp } from './app';
import { getDistributedCache } from './services/caches';
import { SiteRouteResolver } from './services/SiteRouteResolver';
import { SitemapAssembler } from './services/SitemapAssembler';

const settings = loadSettings();
const routes = new SiteRouteResolver(settings.siteUrl);

const sitemapService = new SitemapAssembler({
    cache: getDistributedCache(settings.cacheDriver),
    routes,
    slidingExpirationSeconds: settings.sitemapCacheDurationSeconds,
});

// Initialize database connection before starting server
AppDataSource.initialize().then(() => {
    console.log("Database connection initialized");
    const app = createApp({
        sitemapService,
        routes,
        profileRepo: AppDataSource.getRepository(Profile),
    });
    app.listen(settings.port, () => {
        console.log(`Server running at ${settings.siteUrl} (port ${settings.port})`);
    });
}).catch(error => {
    console.error("Failed to start server:", error);
    process.exitCode = 1;
});
