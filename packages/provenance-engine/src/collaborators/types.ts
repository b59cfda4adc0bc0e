/**
 * External Collaborator Contracts
 *
 * The engine treats similarity retrieval, geometric verification, descriptor
 * computation and image metadata as black boxes behind these interfaces.
 * A collaborator signals "unavailable" by throwing; the engine decides
 * whether that is an isolated or a systemic failure.
 */

import type { DescriptorVariant, ImageId } from '../core/types.js';

// ============================================================================
// Similarity Retrieval
// ============================================================================

export interface RetrievalRequest {
  readonly imageId: ImageId;
  readonly topK: number;
  /** Only return candidates carrying one of these labels */
  readonly labelFilter?: readonly string[];
  /** Restrict the corpus to these owners; undefined means every owner */
  readonly ownerIds?: readonly string[];
}

export interface RetrievalCandidate {
  readonly imageId: ImageId;
  /** Higher is more similar */
  readonly score: number;
}

export interface RetrievalCollaborator {
  /**
   * Ordered list of up to `topK` candidates, best first. May return fewer.
   */
  retrieveSimilar(request: RetrievalRequest): Promise<readonly RetrievalCandidate[]>;
  health?(): Promise<HealthStatus>;
}

// ============================================================================
// Geometric Verification
// ============================================================================

export interface VerificationRequest {
  readonly imageA: ImageId;
  readonly imageB: ImageId;
  readonly variant: DescriptorVariant;
  readonly checkFlip: boolean;
  /** Cached descriptors for both images, when the verifier can use them */
  readonly descriptors: {
    readonly a: Uint8Array;
    readonly b: Uint8Array;
  };
}

export interface MatchResult {
  readonly accepted: boolean;
  /** Ratio of shared content area, 0-1 */
  readonly sharedArea: number;
  readonly keypointCount: number;
  readonly isFlipped: boolean;
}

export interface VerificationCollaborator {
  verifyMatch(request: VerificationRequest): Promise<MatchResult>;
  health?(): Promise<HealthStatus>;
}

// ============================================================================
// Descriptor Computation
// ============================================================================

export interface DescriptorComputer {
  computeDescriptor(imageId: ImageId, variant: DescriptorVariant): Promise<Uint8Array>;
  health?(): Promise<HealthStatus>;
}

// ============================================================================
// Image Catalog
// ============================================================================

export interface ImageMetadata {
  readonly imageId: ImageId;
  readonly owner: string;
  readonly labels: readonly string[];
}

/**
 * Read-only view of corpus metadata. Optional: without it the engine skips
 * seed validation and label filtering is unavailable.
 */
export interface ImageCatalog {
  describe(imageId: ImageId): Promise<ImageMetadata | null>;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthStatus {
  readonly healthy: boolean;
  readonly message: string;
}

/**
 * Everything a traversal needs from the outside world
 */
export interface CollaboratorSet {
  readonly retrieval: RetrievalCollaborator;
  readonly verification: VerificationCollaborator;
  readonly catalog?: ImageCatalog;
}
