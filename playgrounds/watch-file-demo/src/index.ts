import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import {
  StateDirectory,
  Var,
  createLogger,
  defaultTrace,
  describeOutput,
  loadConfig,
  mapOutput,
  observe,
  runEngine,
} from '@rewatch/core';
import { fileContents } from '@rewatch/node';

// Re-evaluates whenever WATCH_FILE changes and writes a summary to the state directory.
const config = loadConfig();
const log = createLogger({ level: config.logLevel });
const stateDir = new StateDirectory(config.stateDirRoot);
const outputDir = await stateDir.resolve('watch-file-demo');

const watchedFile = process.env.WATCH_FILE ?? 'pipeline.txt';
const mode = new Var<'lines' | 'words'>('count-mode', { kind: 'ok', value: 'lines' });

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());
// `kill -USR2 <pid>` switches between counting lines and words
process.on('SIGUSR2', () =>
  mode.update((current) =>
    current.kind === 'ok' && current.value === 'lines' ? { kind: 'ok', value: 'words' } : { kind: 'ok', value: 'lines' }
  )
);

const trace = defaultTrace<number>(log);

await runEngine(
  () => {
    const contents = observe(fileContents(watchedFile, { logger: log }));
    const currentMode = observe(mode.input);
    if (currentMode.kind !== 'ok') return currentMode;
    return mapOutput(contents, (text) =>
      currentMode.value === 'lines' ? text.split('\n').length : text.split(/\s+/).filter(Boolean).length
    );
  },
  {
    logger: log,
    signal: controller.signal,
    trace: (result, watches) => {
      trace(result, watches);
      fs.writeFileSync(path.join(outputDir, 'last-result.txt'), `${describeOutput(result)}\n`);
    },
  }
);
