/**
 * A post scraped from a public channel preview page.
 */
export interface ChannelPost {
  id: string;
  url: string;
  publishedAt: string; // ISO 8601
  html: string;
  text: string;
}

export interface ChannelPage {
  channel: string;
  title: string;
  description: string;
  posts: ChannelPost[];
}
