export type ChatRole = 'system' | 'user' | 'assistant';

export type Message = {
  readonly role: ChatRole;
  readonly content: string;
};

// Ordered context sent on every completion call; element 0 is the system message.
export type Conversation = readonly Message[];

// Keys as they appear in config.json. Absent keys stay absent here.
export type ChatConfigFile = {
  system_prompt?: string;
  model?: string;
  temperature?: number;
  max_tokens?: number;
  bot_name?: string;
  disclaimer?: string;
};

export type ChatSettings = {
  readonly systemPrompt: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly botName: string;
  readonly disclaimer?: string;
};
