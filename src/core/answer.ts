import { SearchHit } from './vector-index';
import { formatTimestamp } from './timestamp';

export const NO_RESULTS_TEXT = "I couldn't find any relevant information about that topic in the channel's content.";
export const FOLLOW_UP_TEXT = 'Would you like more specific information about any of these points?';

export const MAX_VIDEOS = 3;
export const MAX_HITS_PER_VIDEO = 2;
export const SUMMARY_HITS = 3;
export const CITATION_EXCERPT_LENGTH = 150;

export interface AnswerSource {
  videoId: string;
  videoTitle: string;
  videoUrl: string;
  timestamp: string;
  timestampUrl: string;
  text: string;
}

export interface Answer {
  query: string;
  answerText: string;
  sources: AnswerSource[];
  hasSources: boolean;
  generationTimestamp: string;
}

export interface VideoGroup {
  videoId: string;
  title: string;
  url: string;
  hits: SearchHit[];
  bestScore: number;
}

const byScoreDescending = (a: SearchHit, b: SearchHit) => b.score - a.score;

export function groupByVideo(hits: readonly SearchHit[]): VideoGroup[] {
  const groups = new Map<string, VideoGroup>();
  for (const hit of hits) {
    const group = groups.get(hit.videoId);
    if (group) {
      group.hits.push(hit);
      group.bestScore = Math.max(group.bestScore, hit.score);
    } else {
      groups.set(hit.videoId, {
        videoId: hit.videoId,
        title: hit.videoTitle,
        url: hit.videoUrl,
        hits: [hit],
        bestScore: hit.score,
      });
    }
  }
  // Array#sort is stable, so equal best scores keep first-seen order.
  return [...groups.values()].sort((a, b) => b.bestScore - a.bestScore);
}

export function excerpt(text: string, length = CITATION_EXCERPT_LENGTH): string {
  return `${Array.from(text).slice(0, length).join('')}...`;
}

export function emptyAnswer(query: string, answerText: string = NO_RESULTS_TEXT, now: Date = new Date()): Answer {
  return {
    query,
    answerText,
    sources: [],
    hasSources: false,
    generationTimestamp: now.toISOString(),
  };
}

export function assembleAnswer(query: string, hits: readonly SearchHit[], now: Date = new Date()): Answer {
  if (hits.length === 0) {
    return emptyAnswer(query, NO_RESULTS_TEXT, now);
  }

  const lines = [`Based on the content from the YouTube channel, here's what I found about '${query}':`, ''];

  // Summary lines come from all hits, not the per-video selection below.
  for (const hit of [...hits].sort(byScoreDescending).slice(0, SUMMARY_HITS)) {
    lines.push(hit.text);
  }

  lines.push('', 'Here are the specific sources:');

  const sources: AnswerSource[] = [];
  for (const video of groupByVideo(hits).slice(0, MAX_VIDEOS)) {
    for (const hit of [...video.hits].sort(byScoreDescending).slice(0, MAX_HITS_PER_VIDEO)) {
      const source: AnswerSource = {
        videoId: video.videoId,
        videoTitle: video.title,
        videoUrl: video.url,
        timestamp: formatTimestamp(hit.startTime),
        timestampUrl: hit.timestampUrl || video.url,
        text: excerpt(hit.text),
      };
      sources.push(source);
      lines.push(`- ${video.title} at ${source.timestamp}: ${source.text}`, `  Link: ${source.timestampUrl}`, '');
    }
  }

  lines.push(FOLLOW_UP_TEXT);

  return {
    query,
    answerText: lines.join('\n'),
    sources,
    hasSources: sources.length > 0,
    generationTimestamp: now.toISOString(),
  };
}
