import { render } from 'ink';
import { ChoicePrompt } from '../components/ChoicePrompt.js';
import { AutoPrompter, type ChooseOptions, type Prompter } from './prompter.js';

/** Renders each prompt as an ink select list and unmounts on answer. */
export class InkPrompter implements Prompter {
  readonly interactive = true;

  choose<T extends string>(opts: ChooseOptions<T>): Promise<T> {
    return new Promise<T>((resolve) => {
      const app = render(
        <ChoicePrompt
          title={opts.title}
          message={opts.message}
          choices={opts.choices}
          cancelValue={opts.defaultValue}
          onSelect={(value) => {
            app.unmount();
            resolve(value);
          }}
        />,
      );
    });
  }

  async confirm(
    title: string,
    message: string,
    defaultValue: boolean,
  ): Promise<boolean> {
    const answer = await this.choose<'yes' | 'no'>({
      title,
      message,
      choices: [
        { value: 'no', label: 'No' },
        { value: 'yes', label: 'Yes' },
      ],
      defaultValue: defaultValue ? 'yes' : 'no',
    });
    return answer === 'yes';
  }
}

export function createPrompter(opts: { yes?: boolean }): Prompter {
  return opts.yes || !process.stdin.isTTY ? new AutoPrompter() : new InkPrompter();
}
