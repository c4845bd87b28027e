declare module 'mkdirp-classic' {
  type MkdirpCallback = (err: NodeJS.ErrnoException | null, made?: string | null) => void;

  function mkdirp(dir: string, callback: MkdirpCallback): void;
  function mkdirp(dir: string, mode: number, callback: MkdirpCallback): void;

  namespace mkdirp {
    /** Create `dir` and any missing parents; returns the first directory created */
    function sync(dir: string, mode?: number): string | null;
  }

  export = mkdirp;
}
