/**
 * Masks credentials that can end up in log lines: report URLs often carry
 * tokens in the query string, and downloads may send a session cookie.
 */
export class SecretRedactor {
    static readonly MASK = "***REDACTED***";

    // Whole header value, up to the end of the line.
    private static readonly HEADER_PATTERN = /\b(Cookie|Set-Cookie|Authorization)\s*:\s*[^\r\n]+/gi;

    private static readonly BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9\-._~+/]+=*/g;

    // user:password@ in http(s) URLs
    private static readonly URL_CREDENTIALS_PATTERN = /\b(https?:\/\/)[^\s/@:]+:[^\s/@]+@/gi;

    private static readonly QUERY_PATTERN =
        /([?&](?:token|access_token|auth_token|api_key|apikey|password|secret|sig|signature)=)[^&\s#]+/gi;

    // password=..., secret: '...', token="..."
    private static readonly ASSIGNMENT_PATTERN =
        /\b(password|passwd|pwd|secret|token|access_token|api_key|client_secret)\s*[:=]\s*(?:"[^"]*"|'[^']*'|[^\s,;&"']+)/gi;

    public static redact(text: string | undefined | null): string {
        if (!text) return "";
        const mask = SecretRedactor.MASK;

        return text
            .replace(this.HEADER_PATTERN, (_match, header: string) => `${header}: ${mask}`)
            .replace(this.BEARER_PATTERN, mask)
            .replace(this.URL_CREDENTIALS_PATTERN, (_match, scheme: string) => `${scheme}${mask}@`)
            .replace(this.QUERY_PATTERN, (_match, prefix: string) => `${prefix}${mask}`)
            .replace(this.ASSIGNMENT_PATTERN, (_match, key: string) => `${key}=${mask}`);
    }
}
