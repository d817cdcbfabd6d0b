/**
 * ContentSlackExtractor Class
 * Content preview and slack bytes for file entries
 */

import { ClusterReader } from './ClusterReader';

export interface ContentSlackOptions {
  previewLength: number;
  slackLength: number;
}

export interface ContentSlack {
  preview: Buffer;
  /** Null when the content cluster is unallocated: there is no trustworthy end of file. */
  slack: Buffer | null;
  sectors: number[];
  unallocated: boolean;
}

export const DEFAULT_CONTENT_SLACK_OPTIONS: ContentSlackOptions = {
  previewLength: 128,
  slackLength: 32
};

export class ContentSlackExtractor {
  constructor(
    private readonly reader: ClusterReader,
    private readonly options: ContentSlackOptions = DEFAULT_CONTENT_SLACK_OPTIONS
  ) {}

  public extract(contentCluster: number, filesize: number): ContentSlack {
    const previewLength = Math.min(this.options.previewLength, filesize);
    const { data, sectors, unallocated } = this.reader.read(contentCluster, true);

    if (unallocated) {
      return { preview: data.subarray(0, previewLength), slack: null, sectors, unallocated };
    }

    return {
      preview: data.subarray(0, previewLength),
      slack: data.subarray(filesize, filesize + this.options.slackLength),
      sectors,
      unallocated
    };
  }
}
