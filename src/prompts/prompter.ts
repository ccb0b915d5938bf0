import type { PromptChoice } from '../components/ChoicePrompt.js';

export type { PromptChoice };

export interface ChooseOptions<T extends string> {
  title: string;
  message?: string;
  choices: PromptChoice<T>[];
  /** Picked without asking when non-interactive, and on escape. */
  defaultValue: T;
}

export interface Prompter {
  readonly interactive: boolean;
  choose<T extends string>(opts: ChooseOptions<T>): Promise<T>;
  confirm(title: string, message: string, defaultValue: boolean): Promise<boolean>;
}

/** Answers every prompt with its default. Used off a TTY and with --yes. */
export class AutoPrompter implements Prompter {
  readonly interactive = false;

  choose<T extends string>(opts: ChooseOptions<T>): Promise<T> {
    return Promise.resolve(opts.defaultValue);
  }

  confirm(_title: string, _message: string, defaultValue: boolean): Promise<boolean> {
    return Promise.resolve(defaultValue);
  }
}

/** Replays scripted answers in order, then falls back to defaults. */
export class ScriptedPrompter implements Prompter {
  readonly interactive = true;
  readonly asked: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  choose<T extends string>(opts: ChooseOptions<T>): Promise<T> {
    this.asked.push(opts.title);
    const next = this.answers.shift();
    const match = opts.choices.find((c) => c.value === next);
    return Promise.resolve(match ? match.value : opts.defaultValue);
  }

  confirm(title: string, _message: string, defaultValue: boolean): Promise<boolean> {
    this.asked.push(title);
    const next = this.answers.shift();
    if (next === 'yes') return Promise.resolve(true);
    if (next === 'no') return Promise.resolve(false);
    return Promise.resolve(defaultValue);
  }
}
