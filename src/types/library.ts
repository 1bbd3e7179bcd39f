export type LibraryProperties = Record<string, string>;

export interface LibraryEntry {
  name: string;
  path: string;
  /** `.git` metadata present; the directory may still be any kind of checkout */
  isCheckout: boolean;
  properties: LibraryProperties | null;
}
