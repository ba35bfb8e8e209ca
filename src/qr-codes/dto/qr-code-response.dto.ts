import { Link } from '../../common/links';

export interface QrCodeResponseDto {
  message: string;
  qr_code_url: string;
  links: Link[];
}
