// arena-backend/config.ts

import dotenv from "dotenv";

import { ArenaConfig, loadArenaConfig } from "../worldcore/config/ArenaConfig";

// .env first, then validate; a bad value fails startup here, not mid-tick.
dotenv.config();

export const arenaConfig: ArenaConfig = loadArenaConfig(process.env);
