import type { RelayHttpClient } from './client.js';
import type { BinaryFile, ReportCredentials, ReportLink, RequestOptions } from './types.js';

function attachmentName(reportDate?: string): string {
  return reportDate ? `attendance_report_${reportDate}.xlsx` : 'attendance_report.xlsx';
}

export class ReportsResource {
  constructor(private readonly client: RelayHttpClient) {}

  /** Generates a report and returns a download link valid for `expires_in` seconds. */
  generate(body: ReportCredentials, options?: RequestOptions): Promise<ReportLink> {
    return this.client.request<ReportLink>({ method: 'POST', path: '/generate-report', body, options });
  }

  generateDirect(body: ReportCredentials, options?: RequestOptions): Promise<BinaryFile> {
    return this.client.requestBinary(
      { method: 'POST', path: '/generate-report-direct', body, options },
      attachmentName(body.report_date),
    );
  }

  generateDefault(reportDate?: string, options?: RequestOptions): Promise<ReportLink> {
    return this.client.request<ReportLink>({
      method: 'GET',
      path: '/get-report-default',
      query: { report_date: reportDate },
      options,
    });
  }

  generateDefaultDirect(reportDate?: string, options?: RequestOptions): Promise<BinaryFile> {
    return this.client.requestBinary(
      { method: 'GET', path: '/get-report-default-direct', query: { report_date: reportDate }, options },
      attachmentName(reportDate),
    );
  }

  download(fileId: string, options?: RequestOptions): Promise<BinaryFile> {
    return this.client.requestBinary(
      { method: 'GET', path: `/download/${encodeURIComponent(fileId)}`, options },
      attachmentName(),
    );
  }
}
