// Background, no remote command, stdin from /dev/null.
export const SSH_BACKGROUND_FLAGS = ["-f", "-N", "-n"];

// `-M 0` turns off autossh's monitor port; ServerAlive* keepalives detect dead links instead.
export const AUTOSSH_MONITOR_FLAGS = ["-M", "0"];

// Fixed keepalive, timeout and non-interactive options passed as `-o` to every tunnel.
export const SSH_TUNNEL_OPTIONS = [
  "ServerAliveInterval=60",
  "ServerAliveCountMax=3",
  "TCPKeepAlive=yes",
  "ConnectTimeout=10",
  "ConnectionAttempts=3",
  "BatchMode=yes",
  "StrictHostKeyChecking=no",
  "ExitOnForwardFailure=no",
];

export const SSH_EXECUTABLE = "ssh";
export const AUTOSSH_EXECUTABLE = "autossh";
export const WINDOWS_SSH_FALLBACK = "C:\\Windows\\System32\\OpenSSH\\ssh.exe";

// How long a freshly spawned tunnel may run before it counts as started.
export const SPAWN_GRACE_MS = 1000;

// Graceful stop window before SIGKILL, and the liveness poll inside it.
export const STOP_TIMEOUT_MS = 5000;
export const STOP_POLL_INTERVAL_MS = 100;
