#!/usr/bin/env node

import chalk from 'chalk';
import { Command } from 'commander';
import { pstreeCommand } from './commands/pstree.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('pstree')
  .description(
    'Display running processes as a tree, rooted at the given pid or at init when none is given'
  )
  .version(VERSION)
  .argument('[targets...]', 'Processes to start from (pid) or to search for (string)')
  .option('-a, --all', 'Show all processes')
  .option('-u, --user <name>', 'Show only branches containing processes of <name>')
  .option('-U, --no-root', "Don't show branches containing only root processes")
  .option('-p, --pid <pid>', 'Show only branches containing process <pid>')
  .option('-s, --search <string>', 'Show only branches containing processes whose command has <string>')
  .option('-l, --level <n>', 'Print tree to <n> levels deep (default: 100)')
  .option('-w, --wide', 'Wide output, not truncated to the terminal width')
  .option('-g, --graphics <n>', 'Graphics chars: 0=ASCII, 1=IBM-850, 2=VT100, 3=UTF-8')
  .option('-f, --file <path>', "Read 'ps' output from <path> instead of the system ('-' for stdin)")
  .option('-d, --debug', 'Print debugging info to stderr')
  .addHelpText(
    'after',
    `

${chalk.bold('Examples')}

${chalk.gray('  # Whole process tree')}
  ${chalk.cyan('pstree')}

${chalk.gray('  # Branches leading to sshd, three levels deep')}
  ${chalk.cyan('pstree -l 3 sshd')}

${chalk.gray('  # Subtree of a process, drawn with Unicode box characters')}
  ${chalk.cyan('pstree -g 3 1234')}

${chalk.gray('  # Branches with processes not owned by root, from a saved listing')}
  ${chalk.cyan('ps -eo uid,pid,ppid,pgid,args > ps.txt && pstree -U -f ps.txt')}`
  )
  .action(async (args: string[] | undefined, options: Record<string, unknown>) => {
    await pstreeCommand(options, Array.isArray(args) ? args : []);
  });

await program.parseAsync(process.argv);
