import type { FilteredStdioServerTransport } from './custom-stdio.js';

export interface TextContent {
    type: "text";
    text: string;
}

export interface ServerResult {
    content: TextContent[];
    isError?: boolean;
    _meta?: Record<string, unknown>;
}

declare global {
    // eslint-disable-next-line no-var
    var mcpTransport: FilteredStdioServerTransport | undefined;
}
