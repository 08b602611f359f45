import { UsageError } from "./errors";

const BIN = "hssctl";

const COMMAND_FLAGS: Record<string, string[]> = {
  "list-subscribers": ["--imsi", "--limit", "--page", "-l", "-b", "-i"],
  "add-subscriber": ["--ki", "--opc", "--msisdn", "--iccid", "--sqn", "--default-apn", "--apn"],
  "remove-subscriber": [],
  "list-apns": ["--apn", "-l", "-b", "-i"],
  "add-apn": ["--dl", "--ul", "--qci", "--arp", "--preemption-cap", "--preemption-vuln", "--no-preemption-vuln"],
  "remove-apn": [],
  completion: [],
  help: []
};

const COMMANDS = Object.keys(COMMAND_FLAGS);

const GLOBAL_FLAGS = [
  "--help",
  "--api",
  "--api-key",
  "--json",
  "--quiet",
  "--verbose",
  "--timeout-ms"
];

function flagsFor(command: string): string[] {
  return [...(COMMAND_FLAGS[command] ?? []), ...GLOBAL_FLAGS];
}

function bashScript(): string {
  const cases = COMMANDS.filter((c) => c !== "completion" && c !== "help")
    .map((c) => `    ${c}) COMPREPLY=( $(compgen -W "${flagsFor(c).join(" ")}" -- "$cur") ) ;;`)
    .join("\n");
  return `# bash completion for ${BIN}
_${BIN}_completion() {
  local cur
  COMPREPLY=()
  cur="\${COMP_WORDS[COMP_CWORD]}"

  if [[ \${COMP_CWORD} -eq 1 ]]; then
    COMPREPLY=( $(compgen -W "${COMMANDS.join(" ")} ${GLOBAL_FLAGS.join(" ")}" -- "$cur") )
    return 0
  fi

  case "\${COMP_WORDS[1]}" in
    completion) COMPREPLY=( $(compgen -W "bash zsh fish" -- "$cur") ) ;;
${cases}
    *) COMPREPLY=( $(compgen -W "${GLOBAL_FLAGS.join(" ")}" -- "$cur") ) ;;
  esac
}
complete -F _${BIN}_completion ${BIN}
`;
}

function zshScript(): string {
  return `#compdef ${BIN}
_${BIN}() {
  local -a commands
  commands=(${COMMANDS.join(" ")})

  if (( CURRENT == 2 )); then
    compadd -- $commands
    return
  fi

  if [[ "\${words[2]}" == "completion" && CURRENT == 3 ]]; then
    compadd -- bash zsh fish
    return
  fi

  compadd -- ${GLOBAL_FLAGS.join(" ")}
}
_${BIN} "$@"
`;
}

function fishScript(): string {
  const lines: string[] = [
    `# fish completion for ${BIN}`,
    `complete -c ${BIN} -f -n '__fish_use_subcommand' -a "${COMMANDS.join(" ")}"`,
    `complete -c ${BIN} -n '__fish_seen_subcommand_from completion' -a 'bash zsh fish'`
  ];
  for (const flag of GLOBAL_FLAGS) {
    lines.push(`complete -c ${BIN} -l ${flag.replace(/^--/, "")}`);
  }
  for (const [command, flags] of Object.entries(COMMAND_FLAGS)) {
    for (const flag of flags.filter((f) => f.startsWith("--"))) {
      lines.push(`complete -c ${BIN} -n '__fish_seen_subcommand_from ${command}' -l ${flag.replace(/^--/, "")}`);
    }
  }
  return `${lines.join("\n")}\n`;
}

export function completionScriptFor(shell: string): string {
  const normalized = shell.trim().toLowerCase();
  if (normalized === "bash") return bashScript();
  if (normalized === "zsh") return zshScript();
  if (normalized === "fish") return fishScript();
  throw new UsageError(`Unsupported shell: ${shell}`, {
    hint: "Use one of: bash, zsh, fish."
  });
}
