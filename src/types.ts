export interface StoredPage {
  id: number;
  name: string;
  content: string;
}

/**
 * What the show-page handler renders: either a row from the store, or a
 * draft synthesized for a name that has never been saved.
 */
export type PageView =
  | {
      kind: "stored";
      page: StoredPage;
    }
  | {
      kind: "draft";
      name: string;
      content: string;
    };

export interface SaveForm {
  id: number | null;
  title: string;
  markdown: string;
  newPage: boolean;
}
