import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ReportDocument,
  ReportRequest,
  ReportSourcePort,
} from "../../core/ports/inboundPorts";

/**
 * Serves a tiny placeholder PDF so local runs need no report host.
 */
export class MockReportSource implements ReportSourcePort {
  async fetchReport(
    request: ReportRequest,
  ): Promise<Result<ReportDocument, AppBoundaryError>> {
    const body = `%PDF-1.4\n% Sustainability report ${request.companyCode} ${request.period}\n%%EOF\n`;
    return ok({
      bytes: new TextEncoder().encode(body),
      contentType: "application/pdf",
      sourceUrl: `https://reports.example.local/${request.period}/${request.companyCode}.pdf`,
    });
  }
}
