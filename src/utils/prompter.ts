import inquirer from 'inquirer';

export interface SourceChoice {
  playlistId: string;
  title?: string | undefined;
}

/**
 * Interactive questions the CLI asks. Tests substitute canned answers.
 */
export interface Prompter {
  confirm(message: string): Promise<boolean>;
  selectSources(choices: SourceChoice[]): Promise<string[]>;
}

export class InquirerPrompter implements Prompter {
  async confirm(message: string): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: false
      }
    ]);
    return confirmed;
  }

  async selectSources(choices: SourceChoice[]): Promise<string[]> {
    const { sources } = await inquirer.prompt<{ sources: string[] }>([
      {
        type: 'checkbox',
        name: 'sources',
        message: 'Select playlists to sync from:',
        choices: choices.map(choice => ({
          name: choice.title ? `${choice.title} (${choice.playlistId})` : choice.playlistId,
          value: choice.playlistId
        }))
      }
    ]);
    return sources;
  }
}
