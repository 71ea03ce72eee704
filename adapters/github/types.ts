export interface GitHubAuth {
  token: string;
  //NOTE(self): Filled in once the token is verified against GET /user
  username: string | null;
}

export interface GitHubRepoRef {
  owner: string;
  repo: string;
}

export interface GitHubLabel {
  id: number;
  name: string;
  color: string;
  description: string | null;
}

export interface GitHubIssue {
  id: number;
  number: number;
  title: string;
  body: string | null;
  state: 'open' | 'closed';
  user: {
    login: string;
    id: number;
  };
  labels: Array<{
    id: number;
    name: string;
    color: string;
  }>;
  assignees: Array<{
    login: string;
    id: number;
  }>;
  html_url: string;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
  //NOTE(self): Present when the "issue" is actually a pull request
  pull_request?: { url: string };
}

export interface GitHubPullRequest {
  id: number;
  number: number;
  title: string;
  state: 'open' | 'closed';
  draft?: boolean;
  user: {
    login: string;
    id: number;
  };
  head: {
    ref: string;
    sha: string;
  };
  html_url: string;
  created_at: string;
  updated_at: string;
  merged_at: string | null;
  closed_at: string | null;
}

export interface GitHubComment {
  id: number;
  body: string;
  user: {
    login: string;
    id: number;
  };
  html_url: string;
  created_at: string;
  updated_at: string;
}

export interface GitHubUser {
  login: string;
  id: number;
  html_url: string;
  name: string | null;
}

export interface GitHubCheckRun {
  id: number;
  name: string;
  status: 'queued' | 'in_progress' | 'completed' | 'waiting' | 'requested' | 'pending';
  conclusion: 'success' | 'failure' | 'neutral' | 'cancelled' | 'skipped' | 'timed_out' | 'action_required' | 'stale' | null;
  html_url: string | null;
}

export interface GitHubSearchResult<T> {
  total_count: number;
  incomplete_results: boolean;
  items: T[];
}

export interface GitHubErrorBody {
  message?: string;
  errors?: Array<{ code?: string; field?: string; resource?: string }>;
}

export type GitHubResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; status?: number };
