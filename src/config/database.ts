import { DataSource } from "typeorm";
import { CacheEntry } from "../entities/CacheEntry";
import { Profile } from "../entities/Profile";

export const AppDataSource = new DataSource({
    type: "postgres",
    host: process.env.DB_HOST || "localhost",
    port: parseInt(process.env.DB_PORT || "5432"),
    username: process.env.DB_USER || "postgres",
    password: process.env.DB_PASSWORD || "postgres",
    database: process.env.DB_NAME || "site_scaffold",
    synchronize: true,
    logging: false,
    entities: [CacheEntry, Profile],
    subscribers: [],
    migrations: [],
});
