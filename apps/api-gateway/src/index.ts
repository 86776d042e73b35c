import { createApp } from './app.js';
import { loadConfigFromDotenv } from './config.js';

const config = loadConfigFromDotenv();

if (!config.gemini.apiKey) {
  console.warn('GEMINI_API_KEY not set. LLM calls will fail until configured.');
}
if (!config.github.token) {
  console.warn('GITHUB_TOKEN not set. Repository operations will fail until configured.');
}

const app = createApp({ config });
app.listen(config.port, () => console.log(`api-gateway listening on :${config.port}`));
