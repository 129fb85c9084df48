export interface PortalRelayConfig {
  /** Defaults to http://localhost:8000. */
  baseUrl?: string;
  /** Sent as `x-api-key` when the service runs with an operator key. */
  apiKey?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type DebugFileType = 'image' | 'html' | 'other';

export interface DebugFile {
  name: string;
  url: string;
  type: DebugFileType;
  size: number;
}

export interface DebugBlock {
  debug_id: string;
  debug_url: string;
  files: DebugFile[];
}

export interface DebugSessionSummary {
  debug_id: string;
  created_at: string;
  file_count: number;
}

export interface DebugSessionList {
  sessions: DebugSessionSummary[];
  count: number;
}

export interface DebugSession {
  debug_id: string;
  created_at: string;
  files: DebugFile[];
}

export interface BinaryFile {
  data: Uint8Array;
  filename: string;
  contentType: string;
}

export interface ReportCredentials {
  company_code: string;
  username: string;
  password: string;
  /** YYYY-MM-DD; the service uses today when omitted. */
  report_date?: string;
}

export interface ReportLink {
  report_url: string;
  file_id: string;
  report_date: string;
  generated_at: string;
  expires_in: number;
}

export interface PdfToPngRequest {
  pdf_url: string;
  dpi?: number;
}

export interface ConvertedPage {
  page: number;
  url: string;
  filename: string;
}

export interface PdfToPngResponse {
  images: ConvertedPage[];
  total_pages: number;
  conversion_id: string;
  generated_at: string;
  expires_in: number;
}

export interface ExtractTextRequest {
  url: string;
  language?: string;
}

export interface ExtractTextResponse {
  text: string;
  language: string;
  extraction_method: 'tesseract-ocr' | 'pdf-text-layer' | 'pdf-ocr';
  source_type: 'image' | 'pdf';
  total_pages: number;
  extracted_at: string;
  request_id: string;
}

export interface VollnaCookiesRequest {
  email: string;
  password: string;
  final_url: string;
}

export interface VollnaCookiesResponse {
  cookies: string;
  cookie_count: number;
  extracted_at: string;
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  providers: Record<string, string>;
  registry: { artifacts: number };
  scheduler: { pending: number };
}
