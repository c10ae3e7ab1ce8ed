import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ReportDocument,
  ReportRequest,
  ReportSourcePort,
} from "../../core/ports/inboundPorts";
import { HttpClient, toBoundaryError } from "../http/httpClient";

export type HttpReportSourceConfig = {
  /**
   * URL with `{company}` and `{period}` placeholders.
   */
  urlTemplate: string;
  timeoutMs: number;
};

const PDF_MAGIC = "%PDF";

/**
 * Downloads sustainability reports from a templated URL and checks that the body is a PDF.
 */
export class HttpReportSource implements ReportSourcePort {
  constructor(
    private readonly config: HttpReportSourceConfig,
    private readonly httpClient = new HttpClient(),
  ) {}

  async fetchReport(
    request: ReportRequest,
  ): Promise<Result<ReportDocument, AppBoundaryError>> {
    const url = this.config.urlTemplate
      .replaceAll("{company}", encodeURIComponent(request.companyCode))
      .replaceAll("{period}", encodeURIComponent(request.period));

    const response = await this.httpClient.requestBytes({
      url,
      method: "GET",
      timeoutMs: this.config.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      return err(toBoundaryError("report", "http", response.error));
    }

    const { bytes, contentType, finalUrl } = response.value;
    const head = new TextDecoder().decode(bytes.subarray(0, PDF_MAGIC.length));
    if (head !== PDF_MAGIC) {
      return err({
        source: "report",
        code: "not_found",
        provider: "http",
        message: `Report at ${finalUrl} is not a PDF (content-type '${contentType}').`,
        retryable: false,
      });
    }

    return ok({
      bytes,
      contentType: "application/pdf",
      sourceUrl: finalUrl,
    });
  }
}
