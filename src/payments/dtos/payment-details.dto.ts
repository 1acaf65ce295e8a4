import { Transform, TransformFnParams } from 'class-transformer';
import { IsEmail, IsString, Length, Matches, MaxLength } from 'class-validator';

const trimmed = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.trim() : value;

export class CreditCardDetailsDto {
  @Transform(({ value }: TransformFnParams): unknown =>
    typeof value === 'string' ? value.replace(/[\s-]+/g, '') : value,
  )
  @IsString()
  @Matches(/^\d{13,19}$/, { message: 'Invalid card number format' })
  cardNumber: string;

  @Transform(trimmed)
  @IsString()
  @Matches(/^(0[1-9]|1[0-2])\/\d{2}$/, { message: 'Card expiry must be in MM/YY format' })
  cardExpiry: string;

  @Transform(trimmed)
  @IsString()
  @Matches(/^\d{3,4}$/, { message: 'CVV must be 3 or 4 digits' })
  cardCvv: string;

  @Transform(trimmed)
  @IsString()
  @Length(2, 100, { message: 'Cardholder name must be between 2 and 100 characters' })
  @Matches(/^[\p{L}\p{M}\s\-'.]+$/u, { message: 'Cardholder name contains invalid characters' })
  cardHolderName: string;
}

export class PaypalDetailsDto {
  @Transform(({ value }: TransformFnParams): unknown =>
    typeof value === 'string' ? value.trim().toLowerCase() : value,
  )
  @IsString()
  @MaxLength(255)
  @IsEmail({}, { message: 'Invalid PayPal email format' })
  paypalEmail: string;
}

export class BankTransferDetailsDto {
  @Transform(trimmed)
  @IsString()
  @Matches(/^\d{8,20}$/, { message: 'Bank account number must be 8-20 digits' })
  bankAccount: string;

  @Transform(({ value }: TransformFnParams): unknown =>
    typeof value === 'string' ? value.trim().toUpperCase() : value,
  )
  @IsString()
  @Matches(/^[A-Z0-9]{3,10}$/, { message: 'Bank code must be 3-10 alphanumeric characters' })
  bankCode: string;
}
