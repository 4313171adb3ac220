// Load .env from the repo root so tests see the same settings as `npm start`.
import 'dotenv/config';
