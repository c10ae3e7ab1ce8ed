import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  SideArtifactGeneratorPort,
  SideArtifactRequest,
} from "../../core/ports/inboundPorts";
import type { ArtifactStorePort } from "../../core/ports/outboundPorts";
import { HttpClient, toBoundaryError } from "../http/httpClient";

export type HttpSideArtifactConfig = {
  url: string;
  timeoutMs: number;
};

/**
 * Sends the stored report to a word-cloud renderer and keeps the returned image beside the report.
 */
export class HttpSideArtifactGenerator implements SideArtifactGeneratorPort {
  constructor(
    private readonly config: HttpSideArtifactConfig,
    private readonly artifactStore: ArtifactStorePort,
    private readonly httpClient = new HttpClient(),
  ) {}

  async generate(
    request: SideArtifactRequest,
  ): Promise<Result<{ uri: string }, AppBoundaryError>> {
    let report: Uint8Array;
    try {
      report = await this.artifactStore.get(request.documentUri);
    } catch (readError) {
      return err({
        source: "artifact_store",
        code: "not_found",
        provider: "file",
        message: `Report artifact ${request.documentUri} could not be read.`,
        retryable: false,
        cause: readError,
      });
    }

    const response = await this.httpClient.requestBytes({
      url: this.config.url,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        companyCode: request.companyCode,
        period: request.period,
        document: Buffer.from(report).toString("base64"),
      },
      timeoutMs: this.config.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      return err(toBoundaryError("side_artifact", "http", response.error));
    }

    if (response.value.bytes.byteLength === 0) {
      return err({
        source: "side_artifact",
        code: "malformed_response",
        provider: "http",
        message: "Side artifact renderer returned an empty body.",
        retryable: true,
      });
    }

    const uri = await this.artifactStore.put(
      request.jobKey,
      "wordcloud",
      response.value.bytes,
      response.value.contentType || "image/png",
    );
    return ok({ uri });
  }
}
