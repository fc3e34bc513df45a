import {
  Body,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  Query,
  Req,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import { ARTIFACT_NOT_FOUND_MESSAGE } from '../../../common/constants/error-messages.constants';
import {
  buildAttachmentDisposition,
  sanitizeDownloadFilename,
} from '../../../common/http/content-disposition';
import { createLogger } from '../../../common/utils/logger';
import { CatalogCache } from '../application/services/catalog-cache';
import {
  GenerateCatalogDocumentsUseCase,
  ListCategoriesUseCase,
  ListSizesUseCase,
  RetrieveArtifactUseCase,
  type ListCategoriesResponse,
  type ListSizesResponse,
} from '../application/use-cases';
import { GenerateCatalogDocumentsRequestDto } from '../dto/generate-catalog-documents-request.dto';
import { RetrieveArtifactQueryDto } from '../dto/retrieve-artifact-query.dto';

const PDF_CONTENT_TYPE = 'application/pdf';

export interface StoredDocumentLink {
  token: string;
  size: string;
  filename: string;
  url: string;
}

export interface StoredDocumentsResponse {
  ok: true;
  files: StoredDocumentLink[];
}

@Controller('catalog')
@UseGuards(ThrottlerGuard)
export class CatalogController {
  private readonly logger = createLogger(CatalogController.name);

  constructor(
    private readonly listCategories: ListCategoriesUseCase,
    private readonly listSizes: ListSizesUseCase,
    private readonly generateDocuments: GenerateCatalogDocumentsUseCase,
    private readonly retrieveArtifact: RetrieveArtifactUseCase,
    private readonly catalogCache: CatalogCache,
  ) {}

  @Get('categories')
  categories(): Promise<ListCategoriesResponse> {
    return this.listCategories.execute();
  }

  @Get('categories/:category/sizes')
  sizes(@Param('category') category: string): Promise<ListSizesResponse> {
    return this.listSizes.execute(category);
  }

  @Post('documents')
  @HttpCode(200)
  async documents(
    @Req() request: Request,
    @Body() payload: GenerateCatalogDocumentsRequestDto,
  ): Promise<StreamableFile | StoredDocumentsResponse> {
    const requestId = request.requestId ?? randomUUID();
    const sizes = payload.sizes ?? [];

    this.logger.http('catalog_documents_requested', {
      event: 'catalog_documents_requested',
      request_id: requestId,
      category: payload.category,
      sizes_count: sizes.length,
    });

    const result = await this.generateDocuments.execute({ category: payload.category, sizes });

    if (result.kind === 'document') {
      return new StreamableFile(result.content, {
        type: PDF_CONTENT_TYPE,
        disposition: buildAttachmentDisposition(result.filename),
        length: result.content.length,
      });
    }

    return {
      ok: true,
      files: result.files.map((file) => ({
        ...file,
        url: `/catalog/artifacts/${file.token}?filename=${encodeURIComponent(file.filename)}`,
      })),
    };
  }

  @Get('artifacts/:token')
  async artifact(
    @Param('token') token: string,
    @Query() query: RetrieveArtifactQueryDto,
  ): Promise<StreamableFile> {
    const content = await this.retrieveArtifact.execute(token);
    if (!content) {
      throw new NotFoundException(ARTIFACT_NOT_FOUND_MESSAGE);
    }

    return new StreamableFile(content, {
      type: PDF_CONTENT_TYPE,
      disposition: buildAttachmentDisposition(sanitizeDownloadFilename(query.filename)),
      length: content.length,
    });
  }

  @Post('cache/invalidate')
  @HttpCode(200)
  invalidateCache(@Req() request: Request): { ok: true } {
    this.catalogCache.invalidate();
    this.logger.http('catalog_cache_refresh_requested', {
      event: 'catalog_cache_refresh_requested',
      request_id: request.requestId ?? null,
    });

    return { ok: true };
  }
}
