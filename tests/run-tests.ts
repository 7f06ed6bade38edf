import 'tsconfig-paths/register';
import { runTest, tests } from './testHarness';
import { logManager } from '../src/shared/logging/logger';
import './architecture/importBoundaries.test';
import './playbackModel.test';
import './protocolCodec.test';
import './serialTaskQueue.test';
import './logger.test';
import './config.test';
import './playbackSession.test';
import './commandDispatcher.test';
import './playbackAdapters.test';
import './trackMetadataReader.test';
import './httpsLocatorChecker.test';
import './controlServer.test';
import './ctl.test';
import './runtimeShutdown.test';

logManager.configure({ level: 'none' });

async function run(): Promise<void> {
  let failures = 0;
  for (const testCase of tests) {
    try {
      await runTest(testCase);
      console.log(`ok - ${testCase.name}`);
    } catch (error) {
      failures += 1;
      console.error(`not ok - ${testCase.name}`);
      console.error(error);
    }
  }
  console.log(`${tests.length - failures}/${tests.length} passed`);
  // A failed test can leave sockets open; do not wait for them.
  process.exit(failures > 0 ? 1 : 0);
}

void run();
