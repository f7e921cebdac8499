export const config = {
  dbPath: process.env.DB_PATH || "data/providers.db",
  dataDir: process.env.DATA_DIR || "data",
  scraperConfigPath: process.env.SCRAPER_CONFIG_PATH || "config/scraper-config.json",
  dataDictionaryPath: process.env.DATA_DICTIONARY_PATH || "config/data-dictionary.json",
  scrapeDelayMs: parseInt(process.env.SCRAPE_DELAY_MS || "2500", 10),
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || "30000", 10),
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:109.0) Gecko/20100101 Firefox/115.0",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36 Edg/119.0.0.0",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
