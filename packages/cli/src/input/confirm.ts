import { UserAbortedError } from '../errors';
import { Prompter } from './prompter';

/**
 * Ask a yes/no question; anything but yes aborts the command
 */
export async function confirmOrAbort(prompter: Prompter, message: string): Promise<void> {
  const confirmed = await prompter.confirm(message);
  if (confirmed !== true) {
    throw new UserAbortedError();
  }
}
