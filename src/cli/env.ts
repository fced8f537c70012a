import { config } from 'dotenv';

// Imported first by the entry point so .env values are in place before any
// service reads process.env at module load.
config();
