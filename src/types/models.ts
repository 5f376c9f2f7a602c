/**
 * Model catalog and token counting shapes (Anthropic wire format)
 */

export interface ModelInfo {
  type: 'model';
  id: string;
  display_name: string;
  /** RFC 3339 */
  created_at: string;
}

export interface ModelListOptions {
  limit?: number;
  afterId?: string;
  beforeId?: string;
}

export interface ModelListPage {
  data: ModelInfo[];
  hasMore: boolean;
  firstId: string | null;
  lastId: string | null;
}

export interface TokenCount {
  input_tokens: number;
}
