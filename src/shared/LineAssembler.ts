/**
 * 將任意切分的文字 chunk 組回完整的行
 *
 * 以 \n 分行並去掉行尾 \r；不完整的最後一段保留到下個 chunk 或 flush()。
 */
export class LineAssembler {
  private pending = '';

  push(chunk: string): string[] {
    const combined = this.pending + chunk;
    const parts = combined.split('\n');
    this.pending = parts.pop() ?? '';
    return parts.map(stripCarriageReturn);
  }

  flush(): string[] {
    if (this.pending === '') return [];
    const last = stripCarriageReturn(this.pending);
    this.pending = '';
    return [last];
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
