export interface LocatedArtifact {
  path: string;
  sizeBytes: number;
}

export interface ArtifactLocatorPort {
  locate(dirs: readonly string[]): LocatedArtifact[];
}
