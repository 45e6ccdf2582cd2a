// src/core/tiles/pageMetadata.ts

import type { IPageMetadata } from '../../@types/index.ts';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { MetadataParseError, toError } from '../../utils/errors/errors.ts';

const PARSER_OPTIONS = {
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseAttributeValue: false,
    trimValues: true,
};

const integerAttribute = z
    .string()
    .trim()
    .regex(/^\d+$/, 'expected a non-negative integer')
    .transform(Number);

const descriptorSchema = z.object({
    Image: z.object({
        '@_TileSize': integerAttribute,
        Size: z.object({
            '@_Width': integerAttribute,
            '@_Height': integerAttribute,
        }),
    }),
});

/**
 * URL of the deep-zoom descriptor of one page: `{baseUrl}{manuscriptId}_{pageStem}.xml`.
 */
export function buildMetadataUrl(baseUrl: string, manuscriptId: string, pageStem: string): string {
    return `${baseUrl}${manuscriptId}_${pageStem}.xml`;
}

/**
 * Reads width, height and tile size from a deep-zoom descriptor such as
 * `<Image TileSize="256"><Size Width="1000" Height="2000"/></Image>`.
 *
 * The server reports each dimension one larger than the pixel count, so both are reduced by one.
 *
 * @throws {MetadataParseError} When the document is not XML or a field is missing or non-numeric.
 */
export function parsePageMetadata(xml: string, pageStem: string): IPageMetadata {
    let document: unknown;
    try {
        document = new XMLParser(PARSER_OPTIONS).parse(xml, true);
    } catch (error) {
        throw new MetadataParseError(`Failed to parse XML for ${pageStem}: ${toError(error).message}`, {
            cause: error,
        });
    }

    const result = descriptorSchema.safeParse(document);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unexpected structure';
        throw new MetadataParseError(`Failed to parse XML for ${pageStem}: ${where}`, { cause: result.error });
    }

    const { Image: image } = result.data;
    return {
        width: image.Size['@_Width'] - 1,
        height: image.Size['@_Height'] - 1,
        tileSize: image['@_TileSize'],
    };
}
