import inquirer from 'inquirer';

export interface Choice<T extends string> {
  name: string;
  value: T;
}

export interface Prompter {
  select<T extends string>(message: string, choices: Array<Choice<T>>): Promise<T>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
}

export class InquirerPrompter implements Prompter {
  async select<T extends string>(message: string, choices: Array<Choice<T>>): Promise<T> {
    const { choice } = await inquirer.prompt<{ choice: T }>([
      {
        type: 'list',
        name: 'choice',
        message,
        choices,
      },
    ]);
    return choice;
  }

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: defaultValue,
      },
    ]);
    return confirmed;
  }
}
