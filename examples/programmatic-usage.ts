/**
 * Example: Programmatic Usage of Parley
 *
 * Runs two turns of one reply thread against the configured model and
 * tool providers.
 */

import {
  ConfigManager,
  createOrchestrator,
  loadSettings,
  logger,
  LogLevel,
  makeThreadKey,
  ModelInvocationError,
  ThreadKey,
} from '../src/index.js';

async function main() {
  // 1. Settings come from the environment (OPENAI_API_KEY, CACHE_URL, ...)
  const settings = loadSettings();
  logger.setLogLevel(LogLevel.DEBUG);

  // 2. Tool providers come from the saved config (see `parley providers add`)
  const providers = ConfigManager.getInstance();

  const orchestrator = createOrchestrator(settings, {
    providers: () => providers.getProviderSpecs(),
  });

  try {
    // 3. First turn: the user's message 1 in chat 42 starts the thread
    let replyId = 2;
    const first = await orchestrator.handleTurn({
      thread: makeThreadKey(1, 42),
      text: 'Summarise https://example.com in two sentences',
      deliver: (output): ThreadKey => {
        console.log(`${output.title}:\n${output.content}\n`);
        return makeThreadKey(replyId++, 42);
      },
    });
    console.log('Tool providers:', first.toolProviders);
    console.log('Iterations:', first.iterations);

    // 4. Second turn replies to the bot's answer, so the history carries over
    if (first.persistedKey) {
      const second = await orchestrator.handleTurn({
        thread: first.persistedKey,
        text: 'Now make it one sentence',
      });
      console.log(second.output.content);
    }
  } catch (error) {
    if (error instanceof ModelInvocationError) {
      logger.error(`Model failed after ${error.attempts} attempt(s)`, error);
    } else {
      logger.error('Error in main', error);
    }
    process.exitCode = 1;
  } finally {
    await orchestrator.close();
  }
}

main().catch(error => {
  logger.error('Unhandled error', error);
  process.exitCode = 1;
});
