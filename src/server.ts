import { createApp } from './app';
import { createMarketDataClient } from './api/chains/optionChain';
import config from './config';
import { logger } from './utils/logger';

if (!config.accessToken && !config.apiKey) {
    logger.warn('[CONFIG] Neither ACCESS_TOKEN nor API_KEY is set; the market-data API will reject requests.');
}

const app = createApp(createMarketDataClient());

app.listen(config.port, () => {
    logger.info(`Server is running on http://localhost:${config.port}`);
});
