import inquirer from 'inquirer';
import { Confirmer } from './types';

/**
 * y/n question on the terminal. Anything but an explicit yes is a no.
 */
export class InquirerConfirmer implements Confirmer {
  async askConfirmation(message: string): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: false,
      },
    ]);
    return confirmed === true;
  }
}
