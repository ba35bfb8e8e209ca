import { IsInt, IsUrl, Max, MaxLength, Min, ValidateIf } from 'class-validator';

export class CreateQrCodeDto {
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true, require_tld: false })
  @MaxLength(2083)
  url!: string;

  // Minimum QR version; longer URLs get a larger symbol. Absent means 10, null is rejected.
  @ValidateIf((_, value) => value !== undefined)
  @IsInt()
  @Min(1)
  @Max(40)
  size: number = 10;
}
