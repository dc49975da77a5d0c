import { extname } from 'path';

export interface AttachmentRules {
  maxBytes: number;
  allowedExtensions: string[];
}

export function fileExtension(fileName: string): string {
  return extname(fileName).replace(/^\./, '').toLowerCase();
}

/** Returns the list of problems with an uploaded file, empty when it is acceptable. */
export function attachmentProblems(
  file: { originalname: string; size?: number },
  rules: AttachmentRules,
): string[] {
  const problems: string[] = [];
  const ext = fileExtension(file.originalname);

  if (!rules.allowedExtensions.includes(ext)) {
    problems.push(
      `File type not allowed. Allowed types: ${rules.allowedExtensions.join(', ')}`,
    );
  }
  if (file.size !== undefined && file.size > rules.maxBytes) {
    problems.push(
      `File size cannot exceed ${Math.floor(rules.maxBytes / (1024 * 1024))}MB`,
    );
  }
  return problems;
}
