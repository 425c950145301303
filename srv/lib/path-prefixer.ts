const SEPARATOR = "/";

/** Trim leading `/` and `\` characters. */
function trimLeadingSeparators(value: string): string {
  return value.replace(/^[/\\]+/, "");
}

/** Trim trailing `/` and `\` characters. */
function trimTrailingSeparators(value: string): string {
  return value.replace(/[/\\]+$/, "");
}

/**
 * Parent path of a key, `""` when the key sits at the root.
 */
export function dirname(path: string): string {
  const trimmed = trimTrailingSeparators(path);
  const index = trimmed.lastIndexOf(SEPARATOR);
  return index === -1 ? "" : trimmed.slice(0, index);
}

export function joinPath(directory: string, name: string): string {
  return directory ? `${trimTrailingSeparators(directory)}${SEPARATOR}${name}` : name;
}

/**
 * Maps public paths into the container's key space under a fixed root prefix,
 * and back.
 */
export class PathPrefixer {
  readonly prefix: string;

  constructor(prefix?: string | null) {
    const trimmed = trimTrailingSeparators(prefix ?? "");
    this.prefix = trimmed ? `${trimmed}${SEPARATOR}` : "";
  }

  apply(path: string): string {
    return this.prefix + trimLeadingSeparators(path);
  }

  /** Key prefix used to list the contents of a directory. */
  applyDirectory(directory: string): string {
    const key = trimTrailingSeparators(this.apply(directory));
    return key ? `${key}${SEPARATOR}` : "";
  }

  strip(key: string): string {
    return key.startsWith(this.prefix) ? key.slice(this.prefix.length) : key;
  }
}
