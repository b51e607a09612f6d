/**
 * CLI Command: Check
 * Verify the configuration and the reachability of TestRail and the history store
 */

import { requireTestRail } from '../../config/pipeline-config.js';
import { errorMessage } from '../../errors.js';
import { TestRailClient } from '../../services/test-management/index.js';
import { createCollaborators, loadConfig } from '../runtime.js';
import { flagValue } from '../args.js';

export async function executeCheckCommand(args: readonly string[]): Promise<number> {
  let projectKey: string | undefined;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '-p' || args[i] === '--project') {
      projectKey = flagValue(args, i++, '--project');
    }
  }

  const config = loadConfig({ projectKey });
  const testRail = requireTestRail(config);
  let healthy = true;

  console.log(`TestRail:  ${testRail.url} (project ${testRail.projectId}, section ${testRail.sectionId})`);
  const connected = await new TestRailClient(testRail).checkConnection();
  console.log(`  connection: ${connected ? 'ok' : 'FAILED'}`);
  healthy = healthy && connected;

  const collaborators = createCollaborators(config);
  try {
    if (config.history) {
      const ok = collaborators.history ? await collaborators.history.healthCheck() : false;
      console.log(`History:   ${config.history.dbPath} ${ok ? 'ok' : 'FAILED'}`);
      healthy = healthy && ok;
    } else {
      console.log('History:   disabled');
    }
  } catch (error) {
    console.log(`History:   FAILED (${errorMessage(error)})`);
    healthy = false;
  } finally {
    await collaborators.history?.close();
  }

  console.log(`LLM:       ${config.llm ? `${config.llm.provider} / ${config.llm.model}` : 'disabled'}`);
  console.log(`Slack:     ${config.slack ? 'enabled' : 'disabled'}`);

  return healthy ? 0 : 1;
}
