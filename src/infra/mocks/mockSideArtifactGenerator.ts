import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  SideArtifactGeneratorPort,
  SideArtifactRequest,
} from "../../core/ports/inboundPorts";
import type { ArtifactStorePort } from "../../core/ports/outboundPorts";

export class MockSideArtifactGenerator implements SideArtifactGeneratorPort {
  constructor(private readonly artifactStore: ArtifactStorePort) {}

  async generate(
    request: SideArtifactRequest,
  ): Promise<Result<{ uri: string }, AppBoundaryError>> {
    const uri = await this.artifactStore.put(
      request.jobKey,
      "wordcloud",
      new TextEncoder().encode(
        `word cloud for ${request.companyCode} ${request.period}`,
      ),
      "text/plain",
    );
    return ok({ uri });
  }
}
