import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiTags } from '@nestjs/swagger';
import { z } from 'zod';
import { AppConfigService } from '../app/app-config.service';
import { FIT_CATEGORIES } from '../database/schema';
import { FitsService } from './fits.service';

// Express parses `?a=1&a=2` into an array; the last occurrence wins.
function lastValue<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (Array.isArray(value) ? value[value.length - 1] : value), schema);
}

const baseUrlSchema = z.object({
  // Overrides the configured public base URL for absolute image links only. Empty gives relative links.
  request_base: lastValue(z.string().optional()),
});

const createSchema = z.object({
  username: z.string({ required_error: 'username is required' }),
  caption: z.string().optional(),
  // Not checked against the known categories.
  category: z.string().optional(),
  pin: z.string().optional(),
});

const rateSchema = z.object({
  // Plain decimal digits only: `Number()` would also take `0x0A` or `1e1`.
  score: lastValue(
    z
      .string({ required_error: 'score is required' })
      .regex(/^[+-]?\d+$/, 'Score must be an integer')
      .transform(Number),
  ),
  rater_name: lastValue(z.string().optional()),
});

const reactSchema = z.object({
  // Any string, including an empty one.
  emoji: lastValue(z.string({ required_error: 'emoji is required' })),
});

const deleteSchema = z.object({
  pin: lastValue(z.string().optional()),
});

@ApiTags('fits')
@Controller('fits')
export class FitsController {
  constructor(
    private readonly fits: FitsService,
    private readonly appConfig: AppConfigService,
  ) {}

  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      required: ['username', 'image'],
      properties: {
        username: { type: 'string' },
        caption: { type: 'string' },
        category: { type: 'string', description: `Usually one of: ${FIT_CATEGORIES.join(', ')}` },
        pin: { type: 'string', description: 'Optional PIN required later to delete the post' },
        image: { type: 'string', format: 'binary' },
      },
    },
  })
  // No storage option: multer keeps the upload in memory as `image.buffer`.
  @UseInterceptors(FileInterceptor('image'))
  @HttpCode(HttpStatus.OK)
  @Post()
  async create(@Body() body: unknown, @UploadedFile() image: Express.Multer.File | undefined) {
    const parsed = createSchema.parse(body);
    if (!image) throw new BadRequestException('image is required');

    return await this.fits.create({
      username: parsed.username,
      caption: parsed.caption,
      category: parsed.category,
      pin: parsed.pin,
      image: {
        originalName: image.originalname,
        contentType: image.mimetype,
        bytes: image.buffer,
      },
    });
  }

  @Get()
  async list(@Query() query: unknown) {
    const parsed = baseUrlSchema.parse(query);
    return await this.fits.list({ publicBaseUrl: parsed.request_base ?? this.appConfig.publicBaseUrl() });
  }

  @Get(':token')
  async get(@Param('token') token: string, @Query() query: unknown) {
    const parsed = baseUrlSchema.parse(query);
    return await this.fits.getByToken({
      token,
      publicBaseUrl: parsed.request_base ?? this.appConfig.publicBaseUrl(),
    });
  }

  @HttpCode(HttpStatus.OK)
  @Post(':token/rate')
  async rate(@Param('token') token: string, @Query() query: unknown) {
    const parsed = rateSchema.parse(query);
    return await this.fits.rate({ token, score: parsed.score, raterName: parsed.rater_name });
  }

  @HttpCode(HttpStatus.OK)
  @Post(':token/react')
  async react(@Param('token') token: string, @Query() query: unknown) {
    const parsed = reactSchema.parse(query);
    return await this.fits.react({ token, emoji: parsed.emoji });
  }

  @Delete(':token')
  async remove(@Param('token') token: string, @Query() query: unknown) {
    const parsed = deleteSchema.parse(query);
    return await this.fits.remove({ token, pin: parsed.pin });
  }
}
