export interface EngineSettings {
  defaultLanguageId: string;
  emitPendingJudgements: boolean;
}

export interface FeedSettings {
  keepaliveMs: number;
}

export interface PollerSettings {
  intervalMs: number;
}

export interface ScoreboardClientSettings {
  apiKey: string;
  subdomain: string;
  contestId: number;
  showUnofficial: boolean;
  timeoutMs: number;
  pageSize: number;
}

export interface BasicAuthCredentials {
  username: string;
  password: string;
}
