/**
 * HTTP Collaborator Clients
 *
 * JSON clients for the retrieval, verification and descriptor
 * microservices. Responses are validated with zod before they reach the
 * engine; a response that does not match is an error, never a partial value.
 *
 * Endpoints:
 * - POST {retrieval}/search
 * - POST {verification}/verify
 * - POST {descriptors}/descriptors
 * - GET  {any}/health
 *
 * Retries are left to the engine's collaborator guard, so the underlying
 * HTTPClient is created with `maxRetries: 0` unless one is supplied.
 */

import { z } from 'zod';
import type { DescriptorVariant, ImageId } from '../core/types.js';
import type { ServiceEndpoint } from '../core/config.js';
import { HTTPClient, createHTTPClient } from '../core/http-client.js';
import { describeError } from '../core/errors.js';
import type {
  DescriptorComputer,
  HealthStatus,
  MatchResult,
  RetrievalCandidate,
  RetrievalCollaborator,
  RetrievalRequest,
  VerificationCollaborator,
  VerificationRequest,
} from './types.js';

// ============================================================================
// Response Schemas
// ============================================================================

const SearchResponseSchema = z.object({
  results: z.array(
    z.object({
      id: z.union([z.string().min(1), z.number()]),
      /** Cosine distance, 0 = identical */
      distance: z.number(),
      labels: z.array(z.string()).optional(),
    })
  ),
});

const VerifyResponseSchema = z.object({
  accepted: z.boolean(),
  shared_area: z.number().min(0),
  keypoint_count: z.number().int().min(0),
  is_flipped: z.boolean().default(false),
});

const DescriptorResponseSchema = z.object({
  /** Base64 descriptor blob */
  descriptor: z.string().min(1),
});

const HealthResponseSchema = z
  .object({
    status: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export class CollaboratorResponseError extends Error {
  readonly url: string;

  constructor(url: string, message: string) {
    super(`Unexpected response from ${url}: ${message}`);
    this.name = 'CollaboratorResponseError';
    this.url = url;
  }
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, url: string, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new CollaboratorResponseError(
      url,
      issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid body'
    );
  }
  return result.data;
}

export function encodeBlob(blob: Uint8Array): string {
  return Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength).toString('base64');
}

export function decodeBlob(encoded: string): Uint8Array {
  return new Uint8Array(Buffer.from(encoded, 'base64'));
}

// ============================================================================
// Base
// ============================================================================

abstract class ServiceClient {
  protected readonly baseUrl: string;
  protected readonly http: HTTPClient;
  private readonly serviceName: string;

  constructor(serviceName: string, endpoint: ServiceEndpoint, http?: HTTPClient) {
    this.serviceName = serviceName;
    this.baseUrl = endpoint.baseUrl.replace(/\/+$/, '');
    this.http = http ?? createHTTPClient({ timeoutMs: endpoint.timeoutMs, maxRetries: 0 });
  }

  protected url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  async health(): Promise<HealthStatus> {
    const url = this.url('/health');
    try {
      const body = parseResponse(
        HealthResponseSchema,
        url,
        await this.http.fetchJSON(url, { timeoutMs: 10_000, retries: 0 })
      );
      const status = body.status ?? 'ok';
      const healthy = status === 'ok' || status === 'healthy';
      return {
        healthy,
        message: body.message ?? `${this.serviceName} service is ${status}`,
      };
    } catch (error) {
      return {
        healthy: false,
        message: `Failed to connect to ${this.serviceName} service: ${describeError(error)}`,
      };
    }
  }
}

// ============================================================================
// Retrieval
// ============================================================================

export class HttpRetrievalClient extends ServiceClient implements RetrievalCollaborator {
  constructor(endpoint: ServiceEndpoint, http?: HTTPClient) {
    super('retrieval', endpoint, http);
  }

  async retrieveSimilar(request: RetrievalRequest): Promise<readonly RetrievalCandidate[]> {
    const url = this.url('/search');
    const body = await this.http.postJSON(url, {
      image_id: request.imageId,
      top_k: request.topK,
      labels: request.labelFilter ?? null,
      owner_ids: request.ownerIds ?? null,
    });

    const { results } = parseResponse(SearchResponseSchema, url, body);
    return results.map((item) => ({
      imageId: String(item.id),
      score: 1 - item.distance,
    }));
  }
}

// ============================================================================
// Verification
// ============================================================================

export class HttpVerificationClient extends ServiceClient implements VerificationCollaborator {
  constructor(endpoint: ServiceEndpoint, http?: HTTPClient) {
    super('verification', endpoint, http);
  }

  async verifyMatch(request: VerificationRequest): Promise<MatchResult> {
    const url = this.url('/verify');
    const body = await this.http.postJSON(url, {
      image_a: request.imageA,
      image_b: request.imageB,
      descriptor_type: request.variant,
      check_flip: request.checkFlip,
      descriptors: {
        a: encodeBlob(request.descriptors.a),
        b: encodeBlob(request.descriptors.b),
      },
    });

    const match = parseResponse(VerifyResponseSchema, url, body);
    return {
      accepted: match.accepted,
      sharedArea: match.shared_area,
      keypointCount: match.keypoint_count,
      isFlipped: match.is_flipped,
    };
  }
}

// ============================================================================
// Descriptors
// ============================================================================

export class HttpDescriptorClient extends ServiceClient implements DescriptorComputer {
  constructor(endpoint: ServiceEndpoint, http?: HTTPClient) {
    super('descriptor', endpoint, http);
  }

  async computeDescriptor(imageId: ImageId, variant: DescriptorVariant): Promise<Uint8Array> {
    const url = this.url('/descriptors');
    const body = await this.http.postJSON(url, {
      image_id: imageId,
      descriptor_type: variant,
    });

    return decodeBlob(parseResponse(DescriptorResponseSchema, url, body).descriptor);
  }
}
