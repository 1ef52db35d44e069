export interface MatrixConfig {
  homeserver: string;
  roomId: string;
  accessToken: string;
}

export interface MatrixEvent {
  origin_server_ts: number;
  type?: string;
  sender?: string;
  content?: {
    body?: unknown;
    msgtype?: string;
  };
}

export interface MatrixMessagesPage {
  chunk?: MatrixEvent[];
  start?: string;
  end?: string;
}
