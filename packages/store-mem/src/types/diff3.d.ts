// Type declarations for the "diff3" package, which ships none.
declare module "diff3" {
  namespace diff3Merge {
    interface OkRegion<T> {
      ok: T[];
    }

    interface ConflictRegion<T> {
      conflict: {
        a: T[];
        aIndex: number;
        o: T[];
        oIndex: number;
        b: T[];
        bIndex: number;
      };
    }

    type Region<T> = OkRegion<T> | ConflictRegion<T>;
  }

  /**
   * Three-way merge of `a` and `b` against their common origin `o`.
   */
  function diff3Merge<T>(a: T[], o: T[], b: T[]): diff3Merge.Region<T>[];

  export = diff3Merge;
}
