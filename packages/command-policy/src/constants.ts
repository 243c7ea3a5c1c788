/**
 * Constants for @shellgate/command-policy
 */

export const PACKAGE_NAME = "@shellgate/command-policy";

/** Session id shared by every caller that supplies none, when ids are optional. */
export const ANONYMOUS_SESSION_ID = "anonymous";

/** Longest command string the parser accepts. */
export const MAX_COMMAND_LENGTH = 10_000;

export const SEPARATOR_CHARS = {
  pipe: "|",
  sequence: ";",
  background: "&",
} as const;

/** Patterns appended when a separator is disabled, so its literal use is rejected. */
export const DISABLED_SEPARATOR_PATTERNS = {
  pipe: "\\|",
  sequence: ";",
  background: "&",
} as const;

// ---------------------------------------------------------------------------
// Default command lists
// ---------------------------------------------------------------------------

export const DEFAULT_READ_COMMANDS: readonly string[] = [
  "ls",
  "pwd",
  "cat",
  "less",
  "head",
  "tail",
  "grep",
  "find",
  "which",
  "du",
  "df",
  "file",
  "uname",
  "hostname",
  "uptime",
  "date",
  "whoami",
  "id",
  "env",
  "history",
  "man",
  "info",
  "help",
  "sort",
];

export const DEFAULT_WRITE_COMMANDS: readonly string[] = [
  "cp",
  "mv",
  "rm",
  "mkdir",
  "rmdir",
  "touch",
  "chmod",
  "chown",
  "ln",
  "echo",
  "printf",
];

export const DEFAULT_SYSTEM_COMMANDS: readonly string[] = [
  "ps",
  "top",
  "htop",
  "who",
  "netstat",
  "ifconfig",
  "ping",
  "ssh",
  "scp",
  "tar",
  "gzip",
  "zip",
  "unzip",
  "curl",
  "wget",
];

export const DEFAULT_BLOCKED_COMMANDS: readonly string[] = [
  // Privilege escalation
  "sudo",
  "su",
  "passwd",
  "chpasswd",
  "useradd",
  "userdel",
  "groupadd",
  "groupdel",

  // Nested shells and evaluation
  "bash",
  "sh",
  "zsh",
  "ksh",
  "csh",
  "fish",
  "eval",
  "exec",
  "source",
  ".",

  // Terminal multiplexers
  "screen",
  "tmux",

  // Raw network
  "nc",
  "telnet",
  "nmap",

  // Disks and power
  "dd",
  "mkfs",
  "mount",
  "umount",
  "shutdown",
  "reboot",
];

/** Evaluated in this order; the first match is reported. */
export const DEFAULT_DANGEROUS_PATTERNS: readonly string[] = [
  "rm\\s+-rf\\s+/",
  ">\\s*/dev/(sd|hd|nvme|xvd)",
  ">\\s*/dev/null",
  ">\\s*/etc/",
  ">\\s*/boot/",
  ">\\s*/bin/",
  ">\\s*/sbin/",
  ">\\s*/usr/bin/",
  ">\\s*/usr/sbin/",
  ">\\s*/usr/local/bin/",
  "2>&1",
  "\\$\\(",
  "\\$\\{\\w+\\}",
  "`",
];
