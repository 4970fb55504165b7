import { Command } from 'commander';
import { InquirerPrompter, type Prompter } from '../ui/prompter';
import { promptRequest } from '../ui/menu';
import { collectLogs, DEFAULT_TAIL, renderLogs } from './logs';
import { readGlobalOptions, withSession } from './session';

export function registerMenuCommand(program: Command, prompter: Prompter = new InquirerPrompter()) {
  program
    .command('menu')
    .description('Choose actions interactively within one session')
    .action(async () => {
      await withSession(program, async ({ kiln, renderer, signal }) => {
        let request = await promptRequest(prompter);
        while (request && !signal.aborted) {
          if (request === 'logs') {
            // The newest log is this session's own.
            const report = await collectLogs(kiln.paths.logs, DEFAULT_TAIL);
            renderLogs(report, readGlobalOptions(program).json);
          } else {
            const outcome = await kiln.orchestrator.dispatch(request, { signal });
            renderer.render(outcome);
            if (!outcome.success) {
              process.exitCode = 1;
            }
          }
          request = await promptRequest(prompter);
        }
      });
    });
}
