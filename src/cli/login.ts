import type { ChatSessionCredentials } from '@/clients/chat-api.client';
import { ChatClientError, toErrorMessage } from '@/lib/errors';
import { type PromptStreams, promptHidden, promptLine } from './prompt';

export interface LoginOptions {
  username?: string;
  password?: string;
}

export interface LoginClient {
  login(username: string, password: string): Promise<ChatSessionCredentials>;
}

/**
 * Log in, prompting for whatever the flags did not supply. A rejected attempt
 * keeps the username and asks for the password again; errors that are not
 * client errors (a cancelled prompt, a bug) end the loop.
 */
export async function loginWithPrompts(
  client: LoginClient,
  options: LoginOptions,
  streams: PromptStreams,
  print: (line: string) => void
): Promise<ChatSessionCredentials> {
  let username = options.username?.trim() ?? '';
  let password = options.password ?? '';

  for (;;) {
    while (username === '') {
      username = (await promptLine('Enter username: ', streams)).trim();
    }
    if (password === '') {
      password = await promptHidden('Enter password: ', streams);
    }

    try {
      const credentials = await client.login(username, password);
      print('Login successful! Starting chat...');
      return credentials;
    } catch (error) {
      if (!(error instanceof ChatClientError)) {
        throw error;
      }
      print(`Login failed: ${toErrorMessage(error)}. Please try again.`);
      password = '';
    }
  }
}
