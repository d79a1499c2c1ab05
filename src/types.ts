export type HomeworkStatus = "approved" | "reviewing" | "rejected";

export interface HomeworkResponse {
  homeworks: unknown[];
  current_date: number;
}

export interface Credentials {
  practicumToken: string;
  telegramToken: string;
  telegramChatId: string;
}

export interface PollState {
  watermark: number;
  lastStatusMessage: string;
}

export interface MessageSender {
  sendMessage(chatId: string, text: string): Promise<unknown>;
}
