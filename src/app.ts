import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { RouteResolver, SitemapService } from './types';
import { Profile, toPublicProfile } from './entities/Profile';

export interface ProfileRepository {
    findOneBy(where: { id: number }): Promise<Profile | null>;
}

export interface AppDependencies {
    sitemapService: SitemapService;
    routes: RouteResolver;
    profileRepo: ProfileRepository;
}

export function createApp({ sitemapService, routes, profileRepo }: AppDependencies): Express {
    const app = express();

    app.use(cors());
    app.use(express.json());

    // Root sitemap or sitemap index; ?index=N selects a single document
    app.get('/sitemap.xml', async (req: Request, res: Response) => {
        const rawIndex = req.query.index;
        let index: number | undefined;
        if (rawIndex !== undefined) {
            if (typeof rawIndex !== 'string' || !/^-?\d+$/.test(rawIndex)) {
                res.status(400).json({ error: 'Invalid sitemap index' });
                return;
            }
            index = Number(rawIndex);
        }

        try {
            const xml = await sitemapService.getDocument(index);
            if (xml === null) {
                res.status(404).json({ error: 'Sitemap not found' });
                return;
            }
            res.type('application/xml').send(xml);
        } catch (error) {
            console.error('Error building sitemap:', error);
            res.status(500).json({ error: 'Failed to build sitemap' });
        }
    });

    app.get('/robots.txt', (req: Request, res: Response) => {
        try {
            const lines = [
                'User-agent: *',
                'Allow: /',
                `Sitemap: ${routes.routeToAbsoluteUrl('sitemapXml')}`,
            ];
            res.type('text/plain').send(`${lines.join('\n')}\n`);
        } catch (error) {
            console.error('Error building robots.txt:', error);
            res.status(500).json({ error: 'Failed to build robots.txt' });
        }
    });

    app.get('/api/profiles/:id', async (req: Request, res: Response) => {
        const { id } = req.params;
        if (!/^\d+$/.test(id)) {
            res.status(400).json({ error: 'Invalid profile id' });
            return;
        }

        try {
            const profile = await profileRepo.findOneBy({ id: Number(id) });
            if (!profile) {
                res.status(404).json({ error: 'Profile not found' });
                return;
            }
            res.json(toPublicProfile(profile));
        } catch (error) {
            console.error('Error fetching profile:', error);
            res.status(500).json({ error: 'Failed to fetch profile' });
        }
    });

    return app;
}
