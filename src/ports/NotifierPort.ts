export interface NotifierPort {
  sendMessage(chatId: string, text: string): Promise<void>;
  /** Sends to every configured admin; failures for one admin do not stop the others. */
  notifyAdmins(text: string): Promise<void>;
}
