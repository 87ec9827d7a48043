import { CODEC_NAMES } from "@basekit/encoding";
import type { Command } from "commander";
import { CONFIG_KEYS } from "../lib/config";

export function registerCompletionCommands(program: Command): void {
  const completion = program.command("completion").description("Generate shell completion scripts");

  completion
    .command("bash")
    .description("Generate bash completion script")
    .action(() => {
      console.log(generateBashCompletion());
    });
}

export function generateBashCompletion(): string {
  return `# basekit bash completion
# Add this to ~/.bashrc:
#   eval "$(basekit completion bash)"

_basekit_completions() {
    local cur prev words cword
    _init_completion || return

    local commands="encode decode codecs config completion"
    local config_cmds="list get set reset path"
    local config_keys="${CONFIG_KEYS.join(" ")}"
    local codecs="${CODEC_NAMES.join(" ")}"
    local formats="text json yaml table"

    case "\${prev}" in
        -c|--codec)
            COMPREPLY=($(compgen -W "\${codecs}" -- "\${cur}"))
            return
            ;;
        -f|--format)
            COMPREPLY=($(compgen -W "\${formats}" -- "\${cur}"))
            return
            ;;
        -o|--output)
            _filedir
            return
            ;;
    esac

    case "\${words[1]}" in
        config)
            case "\${words[2]}" in
                get|set)
                    COMPREPLY=($(compgen -W "\${config_keys}" -- "\${cur}"))
                    return
                    ;;
                *)
                    COMPREPLY=($(compgen -W "\${config_cmds}" -- "\${cur}"))
                    return
                    ;;
            esac
            ;;
        encode|decode)
            if [[ "\${cur}" == -* ]]; then
                COMPREPLY=($(compgen -W "-c --codec -o --output --chunk-size -n --newline -i --ignore-newlines" -- "\${cur}"))
            else
                _filedir
            fi
            return
            ;;
        completion)
            COMPREPLY=($(compgen -W "bash" -- "\${cur}"))
            return
            ;;
    esac

    if [[ "\${cur}" == -* ]]; then
        COMPREPLY=($(compgen -W "-f --format -v --verbose -q --quiet -h --help --version" -- "\${cur}"))
        return
    fi

    COMPREPLY=($(compgen -W "\${commands}" -- "\${cur}"))
}

complete -F _basekit_completions basekit
`;
}
