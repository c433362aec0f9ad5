/**
 * Constants for pip invocation and forwarding
 */

// Options `pip list` accepts but `pip install` does not
export const LIST_ONLY_FLAGS: ReadonlySet<string> = new Set(
  'l local path format not-required exclude-editable include-editable'.split(' ')
)

// Options `pip install` accepts but `pip list` does not
export const INSTALL_ONLY_FLAGS: ReadonlySet<string> = new Set(
  [
    'c constraint no-deps t target platform python-version implementation abi root prefix',
    'b build src U upgrade upgrade-strategy force-reinstall I ignore-installed',
    'ignore-requires-python no-build-isolation use-pep517 install-option global-option',
    'compile no-compile no-warn-script-location no-warn-conflicts no-binary only-binary',
    'prefer-binary no-clean require-hashes progress-bar',
  ]
    .join(' ')
    .split(' ')
)

export const FREEZE_FILE = 'requirements.txt'
export const UPGRADE_PROMPT = 'Upgrade now?'
export const PYTHON_ENV_VAR = 'PIP_REVIEW_PYTHON'

// pip versions that changed `pip list` behaviour
export const PIP_VERSION_CHECK_FLAG_SINCE = '6.0.0'
export const PIP_JSON_FORMAT_AFTER = '9.0.0'
