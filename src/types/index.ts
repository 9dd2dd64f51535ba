export interface RepoBinding {
  ownerRepo: string;
  shortName: string;
  defaultBranch: string;
}

export interface DeveloperBinding {
  userId: string;
  branch: string;
  label: string;
}

export interface SiteBinding {
  siteName: string;
  ownerRepo: string;
}

export interface ChatBinding {
  chatId: string;
  ownerRepo: string;
}

/** Flat table strings as they come from the environment or config file. */
export interface RawTables {
  repos?: string;
  developers?: string;
  sites?: string;
  chats?: string;
}

export type Lookup<T> =
  | { found: true; binding: T }
  | { found: false };

export interface ResolvedTarget {
  repo: RepoBinding;
  branch: string;
  labels: string[];
}

export type SessionState = 'idle' | 'armed' | 'pending' | 'completed';

export interface TicketSession {
  chatId: string;
  userId: string;
  state: Exclude<SessionState, 'idle'>;
  resolvedRepo: RepoBinding;
  resolvedBranch: string;
  labels: string[];
  armedUntil?: number;
  ticketRef?: string;
  buildUrl?: string;
  deployStatus?: DeployStatus;
  createdAt: number;
  updatedAt: number;
}

export type DeployStatus = 'succeeded' | 'failed';

export interface DeployEvent {
  siteName: string;
  status: DeployStatus;
  buildUrl: string;
  branch: string;
  timestamp: number;
}

export interface NotificationPlan {
  chatId: string;
  userId: string;
  ticketRef: string;
  status: DeployStatus;
  buildUrl: string;
  ownerRepo: string;
  branch: string;
}

export interface TicketRequest {
  ownerRepo: string;
  branch: string;
  labels: string[];
  content: string;
  chatId: string;
  author: string;
}

export type TicketCreator = (request: TicketRequest) => Promise<string>;

export interface Notifier {
  notify(plan: NotificationPlan): Promise<void>;
}

export interface RepoSelection {
  chatId: string;
  userId: string;
  shortName: string;
}

export interface DataStore {
  sessions: TicketSession[];
  selections: RepoSelection[];
}
