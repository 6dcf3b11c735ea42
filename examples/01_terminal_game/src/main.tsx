import {
  createContentFilter,
  type Lexicon,
  loadDefaultLexicon,
  loadLexicon,
} from "@passgate/core";
import { render } from "ink";
import { App } from "./app.js";
import { ConfigError, type GameConfig, loadConfig } from "./config.js";
import { createSession } from "./session.js";

async function main() {
  let config: GameConfig;
  try {
    config = loadConfig(process.env);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(e.message);
      process.exitCode = 1;
      return;
    }
    throw e;
  }

  const lexicon: Lexicon = config.lexiconPath
    ? loadLexicon(config.lexiconPath)
    : loadDefaultLexicon();
  const session = createSession(config);

  // Ctrl+C is a key the game handles (quit), not a hard exit.
  const instance = render(
    <App session={session} isDisallowed={createContentFilter(lexicon)} />,
    { exitOnCtrlC: false },
  );
  await instance.waitUntilExit();

  if (config.output) {
    console.log(`[main] session finished: ${session.getView().status}`);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
