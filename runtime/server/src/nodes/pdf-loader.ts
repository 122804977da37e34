import { Document } from '@langchain/core/documents';
import { extractText, getDocumentProxy } from 'unpdf';
import type { NodeInputs, NodeResult } from '../types/index.js';
import { BaseNode } from './base.js';
import type { PdfLoaderConfig } from './config-schemas.js';

type PdfDocument = Awaited<ReturnType<typeof getDocumentProxy>>;

/**
 * Turns uploaded PDF bytes into one document per page (metadata.page is 0-based).
 */
export class PdfLoaderNode extends BaseNode<PdfLoaderConfig> {
  readonly nodeType = 'pdf_loader';

  async process(inputs: NodeInputs): Promise<NodeResult> {
    const content = inputs.file_content;
    if (!(content instanceof Uint8Array) || content.byteLength === 0) {
      return this.failure('No PDF content provided');
    }

    let pdf: PdfDocument | undefined;
    try {
      // pdf.js may transfer the buffer it is given, so hand it a copy
      pdf = await getDocumentProxy(new Uint8Array(content));
      const { totalPages, text } = await extractText(pdf, { mergePages: false });
      const documents = text.map((pageContent, page) => new Document({ pageContent, metadata: { page } }));
      return this.success({ documents }, { total_pages: totalPages });
    } catch (error) {
      return this.failure(error);
    } finally {
      await pdf?.destroy();
    }
  }
}
