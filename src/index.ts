import { loadClassifier } from "./classifier";
import { classifierConfig, serverConfig } from "./config";
import logger from "./logger";
import { createApp, startServer } from "./server";

async function bootstrap() {
  // Lexicons and the trie are built before listening; a bad data directory stops startup here.
  const classifier = loadClassifier(classifierConfig);
  logger.info(
    {
      lexiconDir: classifierConfig.lexiconDir,
      similarityThreshold: classifierConfig.similarityThreshold,
      ...classifier.stats,
    },
    "Classifier ready",
  );

  const app = createApp(classifier, { maxTextLength: serverConfig.maxTextLength });
  await startServer(app, serverConfig.port, serverConfig.host);
  logger.info({ host: serverConfig.host, port: serverConfig.port }, "Feedback classifier listening");
}

bootstrap().catch((error) => {
  logger.error({ err: error }, "Feedback classifier failed to start");
  process.exit(1);
});
