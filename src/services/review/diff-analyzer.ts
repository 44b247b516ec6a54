/**
 * Diff Analysis Module
 *
 * Parses a multi-file unified diff into files and hunks, and maps new-side line
 * numbers to GitHub diff positions for accurate comment placement.
 */

export type DiffLineType = 'add' | 'del' | 'context' | 'meta';

export interface DiffLine {
  type: DiffLineType;
  text: string;
  newLine: number | null;
  /** Lines below the file's first hunk header; the header itself is 0. */
  position: number;
}

export interface DiffHunk {
  header: string;
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  lines: DiffLine[];
}

export type DiffFileStatus = 'added' | 'deleted' | 'modified' | 'renamed';

export interface DiffFile {
  path: string;
  oldPath: string;
  status: DiffFileStatus;
  isBinary: boolean;
  headerLines: string[];
  hunks: DiffHunk[];
  additions: number;
  deletions: number;
}

// Parse hunk headers like @@ -1,4 +1,6 @@ optional section
const HUNK_HEADER_REGEX = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const DIFF_HEADER_REGEX = /^diff --git a\/(.*) b\/(.*)$/;

function stripPrefix(path: string): string {
  return path.replace(/^[ab]\//, '');
}

function newFile(headerLine: string, oldPath: string, path: string): DiffFile {
  return {
    path,
    oldPath,
    status: 'modified',
    isBinary: false,
    headerLines: [headerLine],
    hunks: [],
    additions: 0,
    deletions: 0,
  };
}

// ---/+++ lines belong to the preceding "diff --git" entry only when they name its paths
function continuesGitHeader(file: DiffFile, oldPath: string, path: string): boolean {
  return (
    file.hunks.length === 0 &&
    file.headerLines[0].startsWith('diff --git ') &&
    !file.headerLines.some((headerLine) => headerLine.startsWith('--- ')) &&
    file.oldPath === oldPath &&
    file.path === path
  );
}

/**
 * Parse a unified diff (git format, or plain ---/+++ pairs) into files.
 *
 * Hunk bodies are consumed by their declared line counts, so removed lines that
 * happen to start with "---" are never mistaken for file headers.
 */
export function parseUnifiedDiff(rawDiff: string): DiffFile[] {
  const files: DiffFile[] = [];
  const lines = rawDiff.replace(/\r\n/g, '\n').split('\n');

  let file: DiffFile | null = null;
  let hunk: DiffHunk | null = null;
  let oldRemaining = 0;
  let newRemaining = 0;
  let newLine = 0;
  let position = 0;

  const closeFile = () => {
    if (file) files.push(file);
    file = null;
    hunk = null;
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (hunk && file && (oldRemaining > 0 || newRemaining > 0 || line.startsWith('\\'))) {
      const current: DiffHunk = hunk;
      const currentFile: DiffFile = file;
      if (line.startsWith('\\')) {
        // "\ No newline at end of file" still occupies a diff position
        position++;
        current.lines.push({ type: 'meta', text: line, newLine: null, position });
        continue;
      }
      position++;
      if (line.startsWith('+')) {
        current.lines.push({ type: 'add', text: line, newLine, position });
        currentFile.additions++;
        newLine++;
        newRemaining--;
      } else if (line.startsWith('-')) {
        current.lines.push({ type: 'del', text: line, newLine: null, position });
        currentFile.deletions++;
        oldRemaining--;
      } else {
        // Context line; an empty string is a context line whose leading space was trimmed
        current.lines.push({ type: 'context', text: line.length === 0 ? ' ' : line, newLine, position });
        newLine++;
        oldRemaining--;
        newRemaining--;
      }
      continue;
    }

    if (line.length === 0) continue;

    const diffMatch = DIFF_HEADER_REGEX.exec(line);
    if (diffMatch) {
      closeFile();
      file = newFile(line, diffMatch[1], diffMatch[2]);
      continue;
    }

    // Plain diffs without a "diff --git" line start a file at the "---" header
    if (line.startsWith('--- ') && lines[i + 1]?.startsWith('+++ ')) {
      const oldName = line.slice(4).trim();
      const newName = lines[i + 1].slice(4).trim();
      const oldPath = stripPrefix(oldName === '/dev/null' ? newName : oldName);
      const path = stripPrefix(newName === '/dev/null' ? oldName : newName);
      if (file && continuesGitHeader(file, oldPath, path)) {
        file.headerLines.push(line);
      } else {
        closeFile();
        file = newFile(line, oldPath, path);
      }
      file.headerLines.push(lines[i + 1]);
      if (oldName === '/dev/null') file.status = 'added';
      if (newName === '/dev/null') file.status = 'deleted';
      i++;
      continue;
    }

    if (!file) continue;

    const hunkMatch = HUNK_HEADER_REGEX.exec(line);
    if (hunkMatch) {
      const created: DiffHunk = {
        header: line,
        oldStart: parseInt(hunkMatch[1], 10),
        oldLines: hunkMatch[2] === undefined ? 1 : parseInt(hunkMatch[2], 10),
        newStart: parseInt(hunkMatch[3], 10),
        newLines: hunkMatch[4] === undefined ? 1 : parseInt(hunkMatch[4], 10),
        lines: [],
      };
      // The first hunk header is position 0; later headers count as lines
      position = file.hunks.length === 0 ? 0 : position + 1;
      file.hunks.push(created);
      hunk = created;
      oldRemaining = created.oldLines;
      newRemaining = created.newLines;
      newLine = created.newStart;
      continue;
    }

    if (line.startsWith('new file mode')) {
      file.status = 'added';
    } else if (line.startsWith('deleted file mode')) {
      file.status = 'deleted';
    } else if (line.startsWith('rename from ')) {
      file.status = 'renamed';
      file.oldPath = line.slice('rename from '.length);
    } else if (line.startsWith('rename to ')) {
      file.status = 'renamed';
      file.path = line.slice('rename to '.length);
    } else if (line.startsWith('Binary files ') || line.startsWith('GIT binary patch')) {
      file.isBinary = true;
    }
    file.headerLines.push(line);
  }

  closeFile();
  return files;
}

export function renderHunk(hunk: DiffHunk): string {
  return [hunk.header, ...hunk.lines.map((line) => line.text)].join('\n');
}

export function renderFileHeader(file: DiffFile): string {
  return file.headerLines.join('\n');
}

export function renderFile(file: DiffFile): string {
  return [renderFileHeader(file), ...file.hunks.map(renderHunk)].join('\n');
}

/**
 * New-side line → diff position for every line GitHub accepts a comment on
 * (added and context lines).
 */
export function buildPositionMap(hunks: DiffHunk[]): Map<number, number> {
  const lineToPosition = new Map<number, number>();
  for (const hunk of hunks) {
    for (const line of hunk.lines) {
      if (line.newLine !== null && (line.type === 'add' || line.type === 'context')) {
        lineToPosition.set(line.newLine, line.position);
      }
    }
  }
  return lineToPosition;
}
