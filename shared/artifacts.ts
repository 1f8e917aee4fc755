import type { EnrichedFile, FeedFile, MergedFile } from './types';

export type ArtifactKind = 'news' | 'inshorts' | 'final';

export interface ArtifactStore {
  ensureLayout: () => Promise<void>;
  saveFeedFile: (category: string, data: FeedFile) => Promise<string>;
  loadFeedFile: (category: string) => Promise<FeedFile | null>;
  saveEnrichedFile: (category: string, data: EnrichedFile) => Promise<string>;
  loadEnrichedFile: (category: string) => Promise<EnrichedFile | null>;
  saveMergedFile: (category: string, data: MergedFile) => Promise<string>;
  loadMergedFile: (category: string) => Promise<MergedFile | null>;
  listCategories: (kind: ArtifactKind) => Promise<string[]>;
}

export const artifactFileName = (kind: ArtifactKind, category: string): string => `${kind}_${category}.json`;

export const createNoopArtifactStore = (): ArtifactStore => ({
  ensureLayout: async () => {},
  saveFeedFile: async () => '',
  loadFeedFile: async () => null,
  saveEnrichedFile: async () => '',
  loadEnrichedFile: async () => null,
  saveMergedFile: async () => '',
  loadMergedFile: async () => null,
  listCategories: async () => [],
});
