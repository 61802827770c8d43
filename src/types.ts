// URL record persisted in PostgreSQL
export interface UrlRecord {
  id: number;
  originalUrl: string;
  shortCode: string;
  createdAt: Date;
  updatedAt: Date;
}

// Request body for creating a short URL
export interface CreateUrlRequest {
  originalUrl?: unknown;
}

// Response for URL creation
export interface CreateUrlResponse {
  id: number;
  shortCode: string;
  originalUrl: string;
  shortUrl: string;
}

// Response for URL metadata lookup
export interface UrlRecordResponse {
  id: number;
  originalUrl: string;
  shortCode: string;
  createdAt: string;
  updatedAt: string;
}

// Outcome of resolving a short code on the redirect path
export interface Resolution {
  originalUrl: string;
  source: 'cache' | 'store';
}

// Error body returned by both services
export interface ErrorResponse {
  error: string;
  code?: string;
}
