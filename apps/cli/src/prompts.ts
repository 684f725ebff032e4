import inquirer from 'inquirer';

export async function askText(message: string, options: { default?: string; validate?: (input: string) => true | string } = {}): Promise<string> {
  const { value } = await inquirer.prompt<{ value: string }>([
    {
      type: 'input',
      name: 'value',
      message,
      default: options.default,
      validate: options.validate,
    },
  ]);
  return value.trim();
}

export async function askChoice(message: string, choices: readonly string[], defaultChoice?: string): Promise<string> {
  const { value } = await inquirer.prompt<{ value: string }>([
    {
      type: 'list',
      name: 'value',
      message,
      choices: [...choices],
      default: defaultChoice,
    },
  ]);
  return value;
}
