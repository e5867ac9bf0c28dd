import type { FileMap } from './collaborators.js';

export function mitLicense(holder: string, year: number): string {
  return `MIT License

Copyright (c) ${year} ${holder}

Permission is hereby granted, free of charge, to any person obtaining a copy
of this software and associated documentation files (the "Software"), to deal
in the Software without restriction, including without limitation the rights
to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
copies of the Software, and to permit persons to whom the Software is
furnished to do so, subject to the following conditions:

The above copyright notice and this permission notice shall be included in all
copies or substantial portions of the Software.

THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE
SOFTWARE.
`;
}

export function projectReadme(input: { taskId: string; round: number; brief: string }): string {
  return `# ${input.taskId}

## Description

${input.brief.trim()}

## Setup

No build step. Open \`index.html\` in a browser, or serve the folder with any static file server.

## Usage

The page is published with static hosting; every round updates the same repository.

Round: ${input.round}

## License

MIT. See [LICENSE](LICENSE).
`;
}

/** Adds LICENSE and README.md unless the synthesized files already carry them. */
export function withStandardFiles(
  files: FileMap,
  input: { taskId: string; round: number; brief: string; holder: string; year: number }
): FileMap {
  const out: FileMap = { ...files };
  if (!out.LICENSE) out.LICENSE = mitLicense(input.holder, input.year);
  if (!out['README.md']) out['README.md'] = projectReadme(input);
  return out;
}
