import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface ImageStore {
    resolveUrl(reference: string): string;
}

const ABSOLUTE_URL = /^(https?:)?\/\/|^data:/i;

/** Turns stored image references into URLs; absolute URLs pass through untouched. */
@Injectable()
export class ConfiguredImageStore implements ImageStore {
    private readonly baseUrl: string;

    constructor(configService: ConfigService) {
        this.baseUrl = (configService.get<string>('IMAGE_BASE_URL') ?? '').replace(/\/+$/, '');
    }

    resolveUrl(reference: string): string {
        if (!this.baseUrl || ABSOLUTE_URL.test(reference)) return reference;
        return `${this.baseUrl}/${reference.replace(/^\/+/, '')}`;
    }
}
