/**
 * Everything the text parser assumes about the shape of `Get-Help -Full`
 * output. Swap this (or the parser) out if help ever arrives in a
 * structured form.
 */
export interface HelpLayout {
  /** Column-0 section header tokens */
  headers: {
    name: string;
    synopsis: string;
    syntax: string;
    description: string;
    parameters: string;
  };
  /** Labels opening each line of a parameter's attribute list */
  parameterFields: {
    required: string;
    position: string;
    defaultValue: string;
    pipelineInput: string;
    wildcards: string;
  };
  /** Deepest indentation, in columns, at which a `-Name` parameter anchor is recognised */
  anchorIndent: number;
  /** Columns a tab stands for in leading indentation */
  tabWidth: number;
  /** Word following the dashes of an example anchor */
  exampleLabel: string;
  /** Run of blank lines that closes an example body */
  exampleGap: number;
}

export const DEFAULT_HELP_LAYOUT: HelpLayout = {
  headers: {
    name: 'NAME',
    synopsis: 'SYNOPSIS',
    syntax: 'SYNTAX',
    description: 'DESCRIPTION',
    parameters: 'PARAMETERS',
  },
  parameterFields: {
    required: 'Required?',
    position: 'Position?',
    defaultValue: 'Default value',
    pipelineInput: 'Accept pipeline input?',
    wildcards: 'Accept wildcard characters?',
  },
  anchorIndent: 4,
  tabWidth: 4,
  exampleLabel: 'EXAMPLE',
  exampleGap: 3,
};
