import { Response } from 'express';

export function sendCsv(res: Response, filename: string, content: Buffer): void {
  res.setHeader('Content-Type', 'text/csv; charset=utf-8');
  res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
  res.send(content);
}
