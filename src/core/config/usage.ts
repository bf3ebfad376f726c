// CHANGE: Help text of the command-line interface
// PURITY: CORE

import { URL_EXAMPLE } from "./target.js";

export const USAGE = `diffnote: review Bitbucket Server pull requests in your editor.

Open one file of a pull request in $EDITOR:
  diffnote ${URL_EXAMPLE} review <file>

With --host (and optionally --project) set in ~/.config/diffnote/diffnoterc,
pull requests can be given in shorthand form:
  diffnote CORE/api/1 review src/a.ts   # --host is set
  diffnote api/1 review src/a.ts        # --host and --project are set
  diffnote ~jane/dotfiles/3 ls          # personal repository

Comment on a line by writing a line starting with '# ' below it. Edit an
existing comment to modify it, delete it to remove it. Save and quit the
editor to apply the changes.

Usage:
  diffnote [options] <project>/<repo>/<pr> review <file>
  diffnote [options] <project>/<repo>/<pr> ls
  diffnote [options] <project>/<repo> ls-reviews [-d] [open|merged|declined]
  diffnote -h | --help

Options:
  -h --help             Show this help.
  -u --user=<user>      Stash username.
  -p --pass=<pass>      Stash password, best kept in the rc file.
  -e --editor=<editor>  Editor to use instead of $EDITOR.
  --debug=<level>       Verbosity: 0 warnings, 1 info, 2 debug [default: 0].
  --host=<host>         Stash host used by shorthand targets.
  --project=<project>   Default project, as <project> or <project>/<repo>.
  -d                    Show descriptions in ls-reviews.

The rc file holds one argument per line; command-line arguments override it.
`;
