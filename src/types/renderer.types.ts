/**
 * One rendered PDF page
 */
export interface PageImage {
    /** 1-indexed page number */
    pageNumber: number;
    /** MIME type of `data` */
    mimeType: 'image/png' | 'image/jpeg';
    /** Encoded image bytes */
    data: Buffer;
}

/**
 * Page renderer interface
 *
 * Implementations never throw for unusable input files: they log the reason
 * and return an empty array.
 */
export interface IPageRenderer {
    /**
     * Render the first pages of a PDF
     * @param pdfPath - Path to the PDF file
     * @param maxPages - Number of leading pages to render
     */
    render(pdfPath: string, maxPages: number): Promise<PageImage[]>;

    /**
     * Report whether the renderer's backing tool can run
     */
    checkAvailability?(): Promise<{ available: boolean; detail: string }>;
}
