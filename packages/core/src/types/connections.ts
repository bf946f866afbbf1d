/**
 * Saved connections and forward presets
 */

/** A bookmarked scan target. All-empty means the local machine. */
export interface Connection {
  name: string;
  /** SSH destination used to scan a remote host, e.g. "user@server" */
  remoteHost?: string;
  /** Container whose interior sockets are listed instead of the host's */
  dockerTarget?: string;
}

/** A named SSH forward that can be launched in one keystroke */
export interface Preset {
  name: string;
  /** Optional single-key shortcut */
  key?: string;
  localPort: number;
  remoteHost: string;
  remotePort: number;
  sshHost: string;
}

export const LOCAL_CONNECTION: Readonly<Connection> = Object.freeze({
  name: "Local"
});

/** Saved connections with the implicit Local entry at index 0 */
export function withLocalConnection(saved: Connection[]): Connection[] {
  return [{ ...LOCAL_CONNECTION }, ...saved];
}
