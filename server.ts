import dotenv from 'dotenv';
import { createApp } from './app';
import { type AppConfig, loadConfig } from './config';
import { APP_NAME } from './constants';
import { BlockPipeline } from './services/blockPipeline';
import { type BlockCatalog, loadCatalog } from './services/catalogService';
import { ResponseCache } from './services/responseCache';
import { LocalLanguageModel, TutorService } from './services/tutorService';
import { GeminiVisionService } from './services/visionService';
import { errorMessage } from './utils';

dotenv.config();

// Configuration and catalog errors are fatal at startup
function bootstrap(): { config: AppConfig; catalog: BlockCatalog } {
  try {
    const config = loadConfig();
    return { config, catalog: loadCatalog(config.catalogPath) };
  } catch (error: unknown) {
    console.error(`❌ ${APP_NAME} failed to start: ${errorMessage(error)}`);
    process.exit(1);
  }
}

function start(): void {
  const { config, catalog } = bootstrap();

  const pipeline = new BlockPipeline(catalog, config.pipeline);
  const tutor = new TutorService(
    new LocalLanguageModel(config.tutor),
    catalog,
    pipeline.normalizer,
    new ResponseCache(config.tutor.cacheSize),
  );

  const app = createApp({
    pipeline,
    vision: new GeminiVisionService(config.vision),
    tutor,
    streamDelayMs: config.tutor.streamDelayMs,
  });

  app.listen(config.port, () => {
    console.log(`${APP_NAME} server running on port ${config.port}`);
  });
}

start();
