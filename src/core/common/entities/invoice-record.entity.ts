// src/core/common/entities/invoice-record.entity.ts
import {
    Column,
    CreateDateColumn,
    Entity,
    Index,
    PrimaryGeneratedColumn,
    UpdateDateColumn
} from 'typeorm';

@Entity('invoice_records')
export class InvoiceRecord {

    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'varchar', length: 255 })
    customerName!: string;

    @Column({ type: 'varchar', length: 20 })
    emissionDate!: string;

    // Display string as submitted ("R$ 1.234,56"); part of the fingerprint
    @Column({ type: 'varchar', length: 50 })
    amountDue!: string;

    @Column({ type: 'varchar', length: 50, default: 'Emitida' })
    status!: string;

    @Column({ type: 'boolean', default: false })
    registered!: boolean;

    /** Base64 .xlsx produced at processing time */
    @Column({ type: 'text', default: '' })
    documentBlob!: string;

    @Column({ type: 'simple-json' })
    details!: Record<string, unknown>;

    /** md5(customerName-emissionDate-amountDue) */
    @Index({ unique: true })
    @Column({ type: 'varchar', length: 32 })
    fingerprint!: string;

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
