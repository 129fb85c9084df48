import type { RelayHttpClient } from './client.js';
import type {
  ExtractTextRequest,
  ExtractTextResponse,
  PdfToPngRequest,
  PdfToPngResponse,
  RequestOptions,
} from './types.js';

export class ConversionsResource {
  constructor(private readonly client: RelayHttpClient) {}

  pdfToPng(body: PdfToPngRequest, options?: RequestOptions): Promise<PdfToPngResponse> {
    return this.client.request<PdfToPngResponse>({ method: 'POST', path: '/pdf-to-png', body, options });
  }

  extractText(body: ExtractTextRequest, options?: RequestOptions): Promise<ExtractTextResponse> {
    return this.client.request<ExtractTextResponse>({ method: 'POST', path: '/extract-text', body, options });
  }
}
