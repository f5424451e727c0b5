import type { Command } from 'commander';
import { MirrorCommand } from './mirror-command';

/**
 * Register the mirror service as the program's default action.
 */
export function registerMirrorCommand(program: Command, command: MirrorCommand = new MirrorCommand()): void {
  command.register(program);
}
