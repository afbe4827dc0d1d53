/**
 * Direct-message notifier for events that arrive outside a conversation,
 * such as the consent redirect completing
 */

export interface DirectMessageUser {
  send(content: string): Promise<unknown>;
}

/** The slice of discord.js's UserManager the notifier uses */
export interface UserDirectory {
  fetch(userId: string): Promise<DirectMessageUser>;
}

export class DiscordDmNotifier {
  constructor(private readonly users: UserDirectory) {}

  async notify(userId: string, text: string): Promise<void> {
    const user = await this.users.fetch(userId);
    await user.send(text);
  }
}
