import { Router, type Request, type Response } from 'express';
import {
  NETWORK_LABELS,
  isPostStatus,
  isSocialNetwork,
  type Post,
  type PostStatus,
} from '@social-publisher/shared';
import { NotFoundError, ValidationError } from '../../errors';
import type { ContentOrchestrator } from '../../services/content/orchestrator';
import { buildImagePrompt, type ImageGenerator } from '../../services/content/images';
import type { PostStore } from '../../services/posts/store';
import type { PublishDispatcher } from '../../services/publishing/dispatcher';
import { summarizePublicationStatuses } from '../../services/publishing/resolver';
import type { PublicationStore } from '../../services/publishing/store';
import { asString } from '../../utils/db';

export interface PostsRouterDeps {
  posts: PostStore;
  publications: PublicationStore;
  orchestrator: ContentOrchestrator;
  dispatcher: PublishDispatcher;
  generateImage: ImageGenerator;
}

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBody(req: Request): Payload {
  const body: unknown = req.body;
  return isPayload(body) ? body : {};
}

function readQueryInt(value: unknown): number | undefined {
  const parsed = Number(asString(value));
  return Number.isFinite(parsed) && asString(value) ? parsed : undefined;
}

function validateCreatePayload(payload: Payload): string | null {
  if (!asString(payload.title)) return 'title is required';
  if (!asString(payload.content)) return 'content is required';
  if (payload.ownerId !== undefined && payload.ownerId !== null && typeof payload.ownerId !== 'string') {
    return 'ownerId must be a string';
  }
  return null;
}

export function createPostsRouter(deps: PostsRouterDeps): Router {
  const { posts, publications, orchestrator, dispatcher, generateImage } = deps;
  const router = Router();

  const requirePost = async (id: string): Promise<Post> => {
    const post = await posts.get(id);
    if (!post) {
      throw new NotFoundError('post', id);
    }
    return post;
  };

  router.post('/', async (req: Request, res: Response) => {
    const payload = readBody(req);
    const validationError = validateCreatePayload(payload);
    if (validationError) {
      throw new ValidationError(validationError);
    }

    const post = await posts.create({
      title: String(payload.title).trim(),
      content: String(payload.content).trim(),
      ownerId: asString(payload.ownerId),
    });
    res.status(201).json(post);
  });

  router.get('/', async (req: Request, res: Response) => {
    const statusFilter = asString(req.query.status);
    let status: PostStatus | undefined;
    if (statusFilter) {
      if (!isPostStatus(statusFilter)) {
        throw new ValidationError(`status is invalid: ${statusFilter}`);
      }
      status = statusFilter;
    }

    const list = await posts.list({
      status,
      ownerId: asString(req.query.ownerId) ?? undefined,
      limit: readQueryInt(req.query.limit),
      offset: readQueryInt(req.query.offset),
    });
    res.status(200).json(list);
  });

  router.post('/generate-image', async (req: Request, res: Response) => {
    const payload = readBody(req);
    const postId = asString(payload.postId);
    const adaptedText = asString(payload.adaptedText);
    const network = payload.network;
    if (!postId) throw new ValidationError('postId is required');
    if (!isSocialNetwork(network)) throw new ValidationError('network is invalid');
    if (!adaptedText) throw new ValidationError('adaptedText is required');

    await requirePost(postId);
    const image = await generateImage(buildImagePrompt(adaptedText, NETWORK_LABELS[network]));
    res.status(201).json(image);
  });

  router.get('/:id', async (req: Request, res: Response) => {
    const post = await requirePost(String(req.params.id));
    const items = await publications.listByPost(post.id);
    res.status(200).json({ ...post, publications: items });
  });

  router.delete('/:id', async (req: Request, res: Response) => {
    const deleted = await posts.delete(String(req.params.id));
    if (!deleted) {
      throw new NotFoundError('post', String(req.params.id));
    }
    res.status(204).send();
  });

  router.post('/:id/adapt', async (req: Request, res: Response) => {
    const post = await requirePost(String(req.params.id));
    const payload = readBody(req);
    const networks = payload.networks;
    if (networks !== undefined && !Array.isArray(networks)) {
      throw new ValidationError('networks must be an array');
    }

    const previewOnly = payload.previewOnly === true || payload.preview_only === true;
    const result = await orchestrator.adapt(post, networks, { previewOnly });
    res.status(previewOnly ? 200 : 201).json(result);
  });

  router.post('/:id/publish', async (req: Request, res: Response) => {
    const payload = readBody(req);
    const mediaUrl = asString(payload.mediaUrl) ?? asString(payload.image_url);
    const result = await dispatcher.publishPost(String(req.params.id), mediaUrl);
    res.status(202).json(result);
  });

  router.get('/:id/status', async (req: Request, res: Response) => {
    const post = await requirePost(String(req.params.id));
    const items = await publications.listByPost(post.id);
    const { total, ...byStatus } = summarizePublicationStatuses(items);

    res.status(200).json({
      postId: post.id,
      postStatus: post.status,
      totalPublications: total,
      byStatus,
      publications: items.map((item) => ({
        id: item.id,
        network: item.network,
        status: item.status,
        publishedAt: item.publishedAt,
        errorMessage: item.errorMessage,
        metadata: item.extraData,
      })),
    });
  });

  return router;
}
