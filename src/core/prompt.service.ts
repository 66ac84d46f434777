import prompts from 'prompts';

/**
 * Yes/no question to the user
 */
export interface ConfirmPrompt {
  confirm(message: string): Promise<boolean>;
}

/**
 * Terminal prompt backed by prompts. A cancelled prompt counts as "no".
 */
export class TerminalPrompt implements ConfirmPrompt {
  public async confirm(message: string): Promise<boolean> {
    const { confirmed } = await prompts({
      type: 'confirm',
      name: 'confirmed',
      message,
      initial: false,
    });
    return confirmed === true;
  }
}
