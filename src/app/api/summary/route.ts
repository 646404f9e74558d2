import { NextResponse } from 'next/server';
import { z } from 'zod';
import { classifySummary } from '@/lib/analyzers/summary';
import { Category, CATEGORY_MAX_SCORES } from '@/lib/types';

const categoryScore = (category: Category) =>
  z.number().min(0).max(
    CATEGORY_MAX_SCORES[category],
    `${category} score cannot exceed ${CATEGORY_MAX_SCORES[category]}`
  );

const RequestSchema = z.object({
  total_score: z.number().min(0).max(100, 'total_score cannot exceed 100'),
  categories: z.object({
    information_architecture: categoryScore('information_architecture'),
    cta_visibility: categoryScore('cta_visibility'),
    readability: categoryScore('readability'),
    form_ux: categoryScore('form_ux'),
    accessibility: categoryScore('accessibility'),
    performance: categoryScore('performance'),
  }),
  recommendations: z.array(z.string()).default([]),
});

export async function POST(request: Request) {
  try {
    const body = RequestSchema.parse(await request.json());
    const summary = classifySummary({
      totalScore: body.total_score,
      categories: body.categories,
      recommendations: body.recommendations,
    });
    return NextResponse.json(summary);
  } catch (error) {
    if (error instanceof z.ZodError) {
      return NextResponse.json(
        { error: `Invalid request: ${error.issues.map(i => i.message).join(', ')}` },
        { status: 400 }
      );
    }
    if (error instanceof SyntaxError) {
      return NextResponse.json({ error: 'Invalid request body' }, { status: 400 });
    }
    console.error('POST /api/summary error:', error);
    return NextResponse.json({ error: 'Failed to build summary' }, { status: 500 });
  }
}
